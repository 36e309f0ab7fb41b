/**
 * Tests for <tab-preview> Lit component.
 *
 * Assertions go through properties and host styles rather than the shadow
 * DOM, which happy-dom renders only partially for conditional templates.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import '../tab-preview';
import type { TabPreview } from '../tab-preview';
import type { AnimationSpec, IAnimatorPort } from '../../ports/animator.port';
import { logger } from '../../utils/logger';

const instantAnimator: IAnimatorPort = {
  async animate({ to, onUpdate }: AnimationSpec): Promise<void> {
    onUpdate(to);
  },
};

/** Helper: create a tab-preview, attach, and wait for render */
async function createElement(): Promise<TabPreview> {
  const el = document.createElement('tab-preview');
  document.body.appendChild(el);
  await el.updateComplete;
  return el;
}

describe('TabPreview', () => {
  let el: TabPreview;

  beforeEach(() => {
    logger.clear();
    logger.setConsoleMirror(false);
  });

  afterEach(() => {
    el?.remove();
    logger.setConsoleMirror(true);
  });

  it('registers as custom element', () => {
    expect(customElements.get('tab-preview')).toBeDefined();
  });

  it('starts hidden', async () => {
    el = await createElement();
    expect(el.visible).toBe(false);
    expect(el.hidden).toBe(true);
  });

  it('toggles the hidden attribute through visible', async () => {
    el = await createElement();

    el.visible = true;
    expect(el.hidden).toBe(false);

    el.visible = false;
    expect(el.hidden).toBe(true);
  });

  it('writes translationX as a host transform', async () => {
    el = await createElement();

    el.translationX = -1020;
    expect(el.translationX).toBe(-1020);
    expect(el.style.transform).toBe('translateX(-1020px)');

    el.translationX = 0;
    expect(el.style.transform).toBe('');
  });

  it('writes alpha as host opacity', async () => {
    el = await createElement();

    el.alpha = 0.5;

    expect(el.alpha).toBe(0.5);
    expect(el.style.opacity).toBe('0.5');
  });

  it('loads the thumbnail from the resolver', async () => {
    el = await createElement();
    const resolver = vi.fn(async (tabId: string) => `blob:thumb-${tabId}`);
    el.resolveThumbnail = resolver;

    el.loadThumbnail('tab-7', true);

    expect(el.tabId).toBe('tab-7');
    expect(el.isPrivate).toBe(true);
    await vi.waitFor(() => expect(el.thumbnailSrc).toBe('blob:thumb-tab-7'));
    expect(resolver).toHaveBeenCalledWith('tab-7', true);
  });

  it('reflects private browsing as an attribute', async () => {
    el = await createElement();

    el.loadThumbnail('tab-1', true);
    await el.updateComplete;

    expect(el.hasAttribute('private')).toBe(true);
  });

  it('keeps only the latest thumbnail when loads overlap', async () => {
    el = await createElement();
    const pending = new Map<string, (src: string) => void>();
    el.resolveThumbnail = (tabId) => new Promise<string>((resolve) => { pending.set(tabId, resolve); });

    el.loadThumbnail('slow', false);
    el.loadThumbnail('fast', false);
    await vi.waitFor(() => expect(pending.size).toBe(2));

    pending.get('fast')?.('blob:fast');
    await vi.waitFor(() => expect(el.thumbnailSrc).toBe('blob:fast'));

    pending.get('slow')?.('blob:slow');
    await new Promise((r) => setTimeout(r, 0));
    expect(el.thumbnailSrc).toBe('blob:fast');
  });

  it('logs a failed thumbnail load and keeps the background', async () => {
    el = await createElement();
    el.resolveThumbnail = () => Promise.reject(new Error('thumbnail missing'));

    el.loadThumbnail('tab-2', false);

    await vi.waitFor(() => expect(logger.getLogs()).toHaveLength(1));
    const [entry] = logger.getLogs();
    expect(entry.level).toBe('WARN');
    expect(entry.data).toEqual({ tabId: 'tab-2', error: 'thumbnail missing' });
    expect(el.thumbnailSrc).toBe('');
  });

  it('shows only the background without a resolver', async () => {
    el = await createElement();

    el.loadThumbnail('tab-3', false);

    expect(el.thumbnailSrc).toBe('');
    expect(el.tabId).toBe('tab-3');
  });

  it('fades alpha to zero through its animator', async () => {
    el = await createElement();
    const animate = vi.spyOn(instantAnimator, 'animate');
    el.animator = instantAnimator;
    el.alpha = 1;

    await el.fadeOut(200);

    expect(el.alpha).toBe(0);
    expect(animate).toHaveBeenCalledWith(expect.objectContaining({ from: 1, to: 0, durationMs: 200 }));
  });
});
