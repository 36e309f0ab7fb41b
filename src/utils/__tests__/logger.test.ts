import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger } from '../logger';

describe('logger', () => {
  beforeEach(() => {
    logger.clear();
    logger.setLevel('DEBUG');
    logger.setConsoleMirror(false);
  });

  afterEach(() => {
    logger.setLevel('INFO');
    logger.setConsoleMirror(true);
    vi.restoreAllMocks();
  });

  it('buffers entries with level, category and data', () => {
    logger.info('Gesture', 'Armed', { direction: 'right-to-left' });

    const [entry] = logger.getLogs();
    expect(entry.level).toBe('INFO');
    expect(entry.category).toBe('Gesture');
    expect(entry.message).toBe('Armed');
    expect(entry.data).toEqual({ direction: 'right-to-left' });
  });

  it('drops entries below the configured level', () => {
    logger.setLevel('WARN');
    logger.debug('Gesture', 'noise');
    logger.info('Gesture', 'noise');
    logger.warn('Gesture', 'kept');

    expect(logger.getLogs().map(e => e.message)).toEqual(['kept']);
  });

  it('mirrors to the matching console method', () => {
    logger.setConsoleMirror(true);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.warn('Settle', 'slow frame');
    logger.error('Settle', 'failed', { code: 1 });

    expect(warn).toHaveBeenCalledWith('[ToolbarSwipe][WARN][Settle]', 'slow frame');
    expect(error).toHaveBeenCalledWith('[ToolbarSwipe][ERROR][Settle]', 'failed', { code: 1 });
  });

  it('getText renders one line per entry', () => {
    logger.info('Gesture', 'first');
    logger.error('Settle', 'second', { n: 2 });

    const lines = logger.getText().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/INFO  \| Gesture      \| first$/);
    expect(lines[1]).toMatch(/ERROR \| Settle       \| second \{"n":2\}$/);
  });

  it('clear empties the buffer', () => {
    logger.info('Gesture', 'x');
    logger.clear();
    expect(logger.getLogs()).toHaveLength(0);
  });
});
