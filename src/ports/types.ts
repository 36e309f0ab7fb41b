/**
 * Shared value types for the toolbar gesture ports.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Screen rectangle; left/top inclusive, right/bottom exclusive */
export interface Rect {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export type GestureDirection =
  | 'left-to-right'
  | 'right-to-left'
  | 'top-to-bottom'
  | 'bottom-to-top';

export type LayoutDirection = 'ltr' | 'rtl';

export type ToolbarPosition = 'top' | 'bottom';

export type BrowsingMode = 'normal' | 'private';

/** Tab tray page to open, scoped to the browsing mode */
export type TrayPage = 'normal-tabs' | 'private-tabs';

/** A tab as the gesture core sees it */
export interface TabRef {
  readonly id: string;
  readonly isPrivate: boolean;
}

/** What a gesture currently targets */
export type Destination =
  | { readonly kind: 'tab'; readonly tabId: string; readonly isPrivate: boolean }
  | { readonly kind: 'none' }
  | { readonly kind: 'tray' };
