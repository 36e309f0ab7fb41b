/**
 * INavigationPort — screen transitions triggered by a settled gesture.
 */

import type { TrayPage } from './types';

export interface INavigationPort {
  navigateToTray(page: TrayPage): void;
  navigateToNewTab(focusAddressBar: boolean): void;
}
