/**
 * Surface ports — the two views a toolbar swipe moves around.
 */

/** The current page's rendered view */
export interface IContentSurfacePort {
  translationX: number;
  readonly width: number;
}

/** Stand-in for the tab being swiped to */
export interface ITabPreviewPort {
  translationX: number;
  alpha: number;
  visible: boolean;

  /** Start loading the thumbnail of the given tab */
  loadThumbnail(tabId: string, isPrivate: boolean): void;

  /** Animate alpha to 0; resolves when the fade has finished */
  fadeOut(durationMs: number): Promise<void>;
}
