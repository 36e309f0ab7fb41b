/**
 * InMemoryTabStore — ITabStorePort backed by a plain ordered list.
 * Suitable for hosts without a tab store of their own.
 */

import type { ITabStorePort } from '../ports/tab-store.port';
import type { TabRef } from '../ports/types';

export class InMemoryTabStore implements ITabStorePort {
  private tabs: TabRef[] = [];
  private selectedId: string | null = null;
  private readonly listeners = new Set<(selectedId: string | null) => void>();

  constructor(tabs: readonly TabRef[] = [], selectedId: string | null = null) {
    this.tabs = [...tabs];
    this.selectedId = selectedId;
  }

  getSelectedTab(): TabRef | null {
    if (this.selectedId === null) return null;
    return this.tabs.find((tab) => tab.id === this.selectedId) ?? null;
  }

  getTabs(isPrivate: boolean): readonly TabRef[] {
    return this.tabs.filter((tab) => tab.isPrivate === isPrivate);
  }

  selectTab(tabId: string): void {
    if (!this.tabs.some((tab) => tab.id === tabId)) return;
    this.selectedId = tabId;
    this.notify();
  }

  /** Append a tab; it does not become selected */
  addTab(tab: TabRef): void {
    this.tabs = [...this.tabs.filter((t) => t.id !== tab.id), tab];
  }

  /** Remove a tab, clearing the selection if it was selected */
  removeTab(tabId: string): void {
    this.tabs = this.tabs.filter((tab) => tab.id !== tabId);
    if (this.selectedId === tabId) {
      this.selectedId = null;
      this.notify();
    }
  }

  onSelectionChanged(callback: (selectedId: string | null) => void): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  // ── Private ──

  private notify(): void {
    for (const cb of this.listeners) {
      cb(this.selectedId);
    }
  }
}
