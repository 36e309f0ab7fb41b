/**
 * Settle planning: what a released gesture should do, decided before any
 * animation starts.
 */

import type { Destination, GestureDirection, LayoutDirection, ToolbarPosition, TrayPage } from '../ports/types';
import type { GestureSession } from './session';

export type SettlePlan =
  | { readonly kind: 'switch-tab'; readonly tabId: string }
  | { readonly kind: 'open-tray'; readonly page: TrayPage }
  | { readonly kind: 'open-new-tab' }
  | { readonly kind: 'cancel'; readonly fling: boolean };

export interface SettleInput {
  readonly session: GestureSession;
  readonly destination: Destination;
  readonly complete: boolean;
  /** Release velocity along the gesture's axis reached fling speed */
  readonly fling: boolean;
}

/** The tray opens only when swiping away from the edge the toolbar sits on */
export function matchesToolbarEdge(direction: GestureDirection, position: ToolbarPosition): boolean {
  return (direction === 'top-to-bottom' && position === 'top')
    || (direction === 'bottom-to-top' && position === 'bottom');
}

/** Swiping past the last tab in reading order opens a new one */
export function isNewTabSwipe(direction: GestureDirection, layout: LayoutDirection): boolean {
  return (direction === 'right-to-left' && layout === 'ltr')
    || (direction === 'left-to-right' && layout === 'rtl');
}

export function planSettle({ session, destination, complete, fling }: SettleInput): SettlePlan {
  const { direction, env } = session;
  const cancel: SettlePlan = { kind: 'cancel', fling };

  switch (destination.kind) {
    case 'tab':
      return complete ? { kind: 'switch-tab', tabId: destination.tabId } : cancel;
    case 'tray':
      if (!matchesToolbarEdge(direction, env.toolbarPosition)) return cancel;
      return { kind: 'open-tray', page: env.browsingMode === 'private' ? 'private-tabs' : 'normal-tabs' };
    case 'none':
      return complete && isNewTabSwipe(direction, env.layoutDirection) ? { kind: 'open-new-tab' } : cancel;
  }
}
