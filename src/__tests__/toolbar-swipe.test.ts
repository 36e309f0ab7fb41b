import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { attachToolbarSwipe } from '../toolbar-swipe';
import { InMemoryTabStore } from '../adapters/in-memory-tab-store-adapter';
import '../components/tab-preview';
import type { AnimationSpec, IAnimatorPort } from '../ports/animator.port';
import type { INavigationPort } from '../ports/navigation.port';
import { logger } from '../utils/logger';

const instantAnimator: IAnimatorPort = {
  async animate({ to, onUpdate }: AnimationSpec): Promise<void> {
    onUpdate(to);
  },
};

function setup() {
  const toolbar = document.createElement('div');
  const content = document.createElement('div');
  const preview = document.createElement('tab-preview');
  document.body.append(content, preview, toolbar);

  vi.spyOn(toolbar, 'getBoundingClientRect').mockReturnValue(new DOMRect(0, 900, 1000, 56));
  vi.spyOn(content, 'getBoundingClientRect').mockReturnValue(new DOMRect(0, 0, 1000, 900));

  const tabs = new InMemoryTabStore([
    { id: 'a', isPrivate: false },
    { id: 'b', isPrivate: false },
  ], 'a');
  const navigation: INavigationPort = { navigateToTray: vi.fn(), navigateToNewTab: vi.fn() };

  const swipe = attachToolbarSwipe({
    toolbar,
    content,
    preview,
    tabs,
    navigation,
    toolbarPosition: 'bottom',
    getBrowsingMode: () => 'normal',
    animator: instantAnimator,
  });

  const fire = (type: string, x: number, y: number): void => {
    toolbar.dispatchEvent(new PointerEvent(type, { pointerId: 1, pointerType: 'touch', clientX: x, clientY: y }));
  };

  return { swipe, toolbar, content, preview, tabs, navigation, fire };
}

describe('attachToolbarSwipe', () => {
  beforeEach(() => {
    logger.clear();
    logger.setConsoleMirror(false);
  });

  afterEach(() => {
    document.body.innerHTML = '';
    logger.setConsoleMirror(true);
  });

  it('switches tabs from a pointer drag across the toolbar', async () => {
    const { swipe, content, preview, tabs, fire } = setup();

    fire('pointerdown', 900, 930);
    fire('pointermove', 870, 930);
    expect(swipe.handler.getState()).toBe('armed');
    expect(preview.visible).toBe(true);

    fire('pointermove', 300, 930);
    expect(content.style.transform).toBe('translateX(-570px)');

    fire('pointerup', 300, 930);

    await vi.waitFor(() => expect(swipe.handler.getState()).toBe('idle'));
    expect(tabs.getSelectedTab()?.id).toBe('b');
    expect(content.style.transform).toBe('');
    expect(preview.visible).toBe(false);
    expect(preview.alpha).toBe(0);
  });

  it('leaves drags that start above the toolbar alone', () => {
    const { swipe, fire } = setup();

    fire('pointerdown', 500, 400);
    fire('pointermove', 400, 400);

    expect(swipe.handler.getState()).toBe('idle');
    expect(swipe.listener.isSwiping()).toBe(false);
  });

  it('stops reacting after dispose', () => {
    const { swipe, fire } = setup();
    swipe.dispose();

    fire('pointerdown', 900, 930);
    fire('pointermove', 800, 930);

    expect(swipe.handler.getState()).toBe('idle');
  });

  it('rejects invalid configuration up front', () => {
    expect(() => attachToolbarSwipe({
      toolbar: document.createElement('div'),
      content: document.createElement('div'),
      preview: document.createElement('tab-preview'),
      tabs: new InMemoryTabStore(),
      navigation: { navigateToTray: vi.fn(), navigateToNewTab: vi.fn() },
      toolbarPosition: 'top',
      getBrowsingMode: () => 'normal',
      config: { finishPercent: 2 },
    })).toThrow('finishPercent must be in (0, 1], got 2');
  });
});
