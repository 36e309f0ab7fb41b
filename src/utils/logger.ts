/**
 * logger.ts — Category-based logging with an in-memory ring of recent entries.
 * Entries at or above the configured level are kept and mirrored to the console.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly category: string;
  readonly message: string;
  readonly data?: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };
const MAX_LOGS = 2000;

const logs: LogEntry[] = [];
let minLevel: LogLevel = 'INFO';
let consoleMirror = true;

function addEntry(level: LogLevel, category: string, message: string, data?: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, category, message, data };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.splice(0, logs.length - MAX_LOGS);

  if (!consoleMirror) return;
  const prefix = `[ToolbarSwipe][${level}][${category}]`;
  const consoleData = data !== undefined ? [prefix, message, data] : [prefix, message];
  switch (level) {
    case 'ERROR': console.error(...consoleData); break;
    case 'WARN': console.warn(...consoleData); break;
    case 'DEBUG': console.debug(...consoleData); break;
    default: console.log(...consoleData);
  }
}

export const logger = {
  debug: (cat: string, msg: string, data?: unknown) => addEntry('DEBUG', cat, msg, data),
  info:  (cat: string, msg: string, data?: unknown) => addEntry('INFO', cat, msg, data),
  warn:  (cat: string, msg: string, data?: unknown) => addEntry('WARN', cat, msg, data),
  error: (cat: string, msg: string, data?: unknown) => addEntry('ERROR', cat, msg, data),

  /** Drop entries below this level */
  setLevel(level: LogLevel): void {
    minLevel = level;
  },

  getLevel(): LogLevel {
    return minLevel;
  },

  /** Toggle console output; entries are still buffered */
  setConsoleMirror(enabled: boolean): void {
    consoleMirror = enabled;
  },

  /** All buffered entries as plain text, one per line */
  getText(): string {
    return logs.map(e => {
      const dataStr = e.data !== undefined ? ` ${JSON.stringify(e.data)}` : '';
      return `[${e.timestamp}] ${e.level.padEnd(5)} | ${e.category.padEnd(12)} | ${e.message}${dataStr}`;
    }).join('\n');
  },

  getLogs(): readonly LogEntry[] {
    return logs;
  },

  clear(): void {
    logs.length = 0;
  },
};
