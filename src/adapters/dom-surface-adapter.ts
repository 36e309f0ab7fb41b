/**
 * DOM adapters for the surfaces and environment a toolbar swipe reads and moves.
 */

import type { GestureInsets, IToolbarEnvironmentPort } from '../ports/environment.port';
import type { IContentSurfacePort } from '../ports/surface.port';
import type { BrowsingMode, LayoutDirection, Rect, ToolbarPosition } from '../ports/types';

/** Viewport shrink (relative to the layout viewport) that indicates an on-screen keyboard */
const KEYBOARD_VIEWPORT_RATIO = 0.75;

/** Content surface backed by an element's horizontal transform */
export class ElementContentSurface implements IContentSurfacePort {
  private offset = 0;

  constructor(private readonly element: HTMLElement) {}

  get translationX(): number {
    return this.offset;
  }

  set translationX(value: number) {
    this.offset = value;
    this.element.style.transform = value === 0 ? '' : `translateX(${value}px)`;
  }

  get width(): number {
    return this.element.getBoundingClientRect().width;
  }
}

/** The parts of a window the environment reads */
export type EnvironmentWindow = Pick<Window, 'innerWidth' | 'innerHeight' | 'document'> & {
  readonly visualViewport: Pick<VisualViewport, 'height'> | null;
};

export interface DomToolbarEnvironmentConfig {
  readonly toolbar: HTMLElement;
  readonly toolbarPosition: ToolbarPosition;
  readonly getBrowsingMode: () => BrowsingMode;
  /** Host-reported insets; browsers expose none by default */
  readonly getInsets?: () => GestureInsets | null;
  readonly window?: EnvironmentWindow;
}

export class DomToolbarEnvironment implements IToolbarEnvironmentPort {
  private readonly win: EnvironmentWindow;

  constructor(private readonly config: DomToolbarEnvironmentConfig) {
    this.win = config.window ?? window;
  }

  get windowWidth(): number {
    return this.win.innerWidth;
  }

  get toolbarPosition(): ToolbarPosition {
    return this.config.toolbarPosition;
  }

  get layoutDirection(): LayoutDirection {
    const dir = this.config.toolbar.closest('[dir]')?.getAttribute('dir')
      ?? this.win.document.documentElement.getAttribute('dir')
      ?? 'ltr';
    return dir.toLowerCase() === 'rtl' ? 'rtl' : 'ltr';
  }

  get browsingMode(): BrowsingMode {
    return this.config.getBrowsingMode();
  }

  getToolbarRect(): Rect {
    const { left, top, right, bottom } = this.config.toolbar.getBoundingClientRect();
    return { left, top, right, bottom };
  }

  getInsets(): GestureInsets | null {
    return this.config.getInsets?.() ?? null;
  }

  isKeyboardVisible(): boolean {
    const viewport = this.win.visualViewport;
    // No usable measurement without both heights
    if (!viewport || viewport.height <= 0 || this.win.innerHeight <= 0) return false;
    return viewport.height / this.win.innerHeight < KEYBOARD_VIEWPORT_RATIO;
  }
}
