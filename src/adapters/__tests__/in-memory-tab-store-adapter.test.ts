import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryTabStore } from '../in-memory-tab-store-adapter';

describe('InMemoryTabStore', () => {
  let store: InMemoryTabStore;

  beforeEach(() => {
    store = new InMemoryTabStore(
      [
        { id: 'a', isPrivate: false },
        { id: 'p1', isPrivate: true },
        { id: 'b', isPrivate: false },
      ],
      'a',
    );
  });

  it('getTabs keeps order within a privacy partition', () => {
    expect(store.getTabs(false).map((t) => t.id)).toEqual(['a', 'b']);
    expect(store.getTabs(true).map((t) => t.id)).toEqual(['p1']);
  });

  it('getSelectedTab returns the selected tab', () => {
    expect(store.getSelectedTab()).toEqual({ id: 'a', isPrivate: false });
  });

  it('getSelectedTab is null with no selection', () => {
    expect(new InMemoryTabStore([{ id: 'a', isPrivate: false }]).getSelectedTab()).toBeNull();
  });

  it('selectTab changes the selection and notifies', () => {
    const cb = vi.fn();
    store.onSelectionChanged(cb);
    store.selectTab('b');
    expect(store.getSelectedTab()?.id).toBe('b');
    expect(cb).toHaveBeenCalledWith('b');
  });

  it('selectTab ignores unknown ids', () => {
    store.selectTab('missing');
    expect(store.getSelectedTab()?.id).toBe('a');
  });

  it('addTab appends without selecting', () => {
    store.addTab({ id: 'c', isPrivate: false });
    expect(store.getTabs(false).map((t) => t.id)).toEqual(['a', 'b', 'c']);
    expect(store.getSelectedTab()?.id).toBe('a');
  });

  it('removeTab clears a removed selection', () => {
    const cb = vi.fn();
    store.onSelectionChanged(cb);
    store.removeTab('a');
    expect(store.getSelectedTab()).toBeNull();
    expect(cb).toHaveBeenCalledWith(null);
  });

  it('unsubscribe stops notifications', () => {
    const cb = vi.fn();
    const unsub = store.onSelectionChanged(cb);
    unsub();
    store.selectTab('b');
    expect(cb).not.toHaveBeenCalled();
  });
});
