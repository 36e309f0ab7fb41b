/**
 * ITabStorePort — read access to the browser's tab list plus selection.
 */

import type { TabRef } from './types';

export interface ITabStorePort {
  /** The currently selected tab, or null when nothing is selected */
  getSelectedTab(): TabRef | null;

  /** Ordered tabs of one privacy partition */
  getTabs(isPrivate: boolean): readonly TabRef[];

  /** Make the given tab the selected one */
  selectTab(tabId: string): void;
}
