/**
 * <tab-preview> — full-window thumbnail of the tab a toolbar swipe is
 * heading to. Implements ITabPreviewPort so the gesture handler can move,
 * fade and hide it directly.
 */
import { css, html } from 'lit';
import type { IAnimatorPort } from '../ports/animator.port';
import type { ITabPreviewPort } from '../ports/surface.port';
import { FrameAnimator } from '../adapters/frame-animator';
import { logger } from '../utils/logger';
import { BaseElement, sharedStyles } from './base-element';

/** Maps a tab to a thumbnail URL (object URL, data URL or remote) */
export type ThumbnailResolver = (tabId: string, isPrivate: boolean) => string | Promise<string>;

export class TabPreview extends BaseElement implements ITabPreviewPort {
  static override styles = [
    sharedStyles,
    css`
      :host {
        background: var(--tab-preview-background, #fff);
        overflow: hidden;
      }

      :host([private]) {
        background: var(--tab-preview-private-background, #25003e);
      }

      img {
        display: block;
        width: 100%;
        height: 100%;
        object-fit: cover;
        object-position: top left;
      }
    `,
  ];

  static override properties = {
    thumbnailSrc: { attribute: false },
    tabId: { attribute: false },
    isPrivate: { type: Boolean, attribute: 'private', reflect: true },
  };

  declare thumbnailSrc: string;
  declare tabId: string | null;
  declare isPrivate: boolean;

  /** Source of thumbnails; without one the preview shows only its background */
  resolveThumbnail: ThumbnailResolver | null = null;
  animator: IAnimatorPort = new FrameAnimator();

  private offsetX = 0;
  private opacity = 1;
  private shown = false;
  private loadToken = 0;

  constructor() {
    super();
    this.thumbnailSrc = '';
    this.tabId = null;
    this.isPrivate = false;
  }

  override connectedCallback(): void {
    super.connectedCallback();
    this.hidden = !this.shown;
  }

  get translationX(): number {
    return this.offsetX;
  }

  set translationX(value: number) {
    this.offsetX = value;
    this.applyTranslationX(value);
  }

  get alpha(): number {
    return this.opacity;
  }

  set alpha(value: number) {
    this.opacity = value;
    this.style.opacity = String(value);
  }

  get visible(): boolean {
    return this.shown;
  }

  set visible(value: boolean) {
    this.shown = value;
    this.hidden = !value;
  }

  loadThumbnail(tabId: string, isPrivate: boolean): void {
    this.tabId = tabId;
    this.isPrivate = isPrivate;
    this.thumbnailSrc = '';

    const resolver = this.resolveThumbnail;
    if (!resolver) return;

    // Only the latest request may land; a slow earlier one is dropped
    const token = ++this.loadToken;
    void Promise.resolve()
      .then(() => resolver(tabId, isPrivate))
      .then((src) => {
        if (token === this.loadToken) this.thumbnailSrc = src;
      })
      .catch((err: unknown) => {
        logger.warn('TabPreview', 'Thumbnail load failed', {
          tabId,
          error: err instanceof Error ? err.message : String(err),
        });
      });
  }

  fadeOut(durationMs: number): Promise<void> {
    return this.animator.animate({
      from: this.alpha,
      to: 0,
      durationMs,
      onUpdate: (value) => { this.alpha = value; },
    });
  }

  protected override render() {
    return this.thumbnailSrc
      ? html`<img part="thumbnail" src=${this.thumbnailSrc} alt="" draggable="false" />`
      : html``;
  }
}

if (!customElements.get('tab-preview')) {
  customElements.define('tab-preview', TabPreview);
}

declare global {
  interface HTMLElementTagNameMap {
    'tab-preview': TabPreview;
  }
}
