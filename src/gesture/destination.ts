/**
 * Destination resolution: which neighbouring tab a horizontal swipe targets.
 *
 * Swiping right-to-left means "next tab" in reading order. Under an RTL
 * layout the tab strip is mirrored, so the index arithmetic flips while the
 * on-screen motion stays the same.
 */

import type { ITabStorePort } from '../ports/tab-store.port';
import type { Destination, GestureDirection, LayoutDirection } from '../ports/types';

const NONE: Destination = { kind: 'none' };
const TRAY: Destination = { kind: 'tray' };

/** Index step for a horizontal direction, or 0 for vertical ones */
export function indexDelta(direction: GestureDirection, layout: LayoutDirection): -1 | 0 | 1 {
  const ltr = layout === 'ltr';
  switch (direction) {
    case 'right-to-left': return ltr ? 1 : -1;
    case 'left-to-right': return ltr ? -1 : 1;
    case 'top-to-bottom':
    case 'bottom-to-top':
      return 0;
  }
}

export function resolveDestination(
  direction: GestureDirection,
  store: Pick<ITabStorePort, 'getSelectedTab' | 'getTabs'>,
  layout: LayoutDirection,
): Destination {
  const delta = indexDelta(direction, layout);
  if (delta === 0) return TRAY;

  const current = store.getSelectedTab();
  if (!current) return NONE;

  const tabs = store.getTabs(current.isPrivate);
  const currentIndex = tabs.findIndex((tab) => tab.id === current.id);
  if (currentIndex === -1) return NONE;

  const index = currentIndex + delta;
  if (index < 0 || index >= tabs.length) return NONE;

  const target = tabs[index];
  return { kind: 'tab', tabId: target.id, isPrivate: target.isPrivate };
}
