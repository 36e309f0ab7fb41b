/**
 * IToolbarEnvironmentPort — geometry and host facts a gesture reads.
 */

import type { BrowsingMode, LayoutDirection, Rect, ToolbarPosition } from './types';

export interface GestureInsets {
  /** Bottom inset reserved for system gestures */
  readonly mandatoryGestureBottom: number;
  /** Bottom inset of the system bars */
  readonly systemBarBottom: number;
}

export interface IToolbarEnvironmentPort {
  readonly windowWidth: number;
  readonly toolbarPosition: ToolbarPosition;
  readonly layoutDirection: LayoutDirection;
  readonly browsingMode: BrowsingMode;

  /** Toolbar bounds in screen coordinates */
  getToolbarRect(): Rect;

  /** Window insets, or null when the host cannot report them */
  getInsets(): GestureInsets | null;

  isKeyboardVisible(): boolean;
}
