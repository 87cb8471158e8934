import { getDashboardConfig, type LogLevelSetting } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogCategory = 'incidents' | 'cache' | 'api';

const LEVEL_RANK: Record<LogLevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function write(level: LogLevel, category: LogCategory, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[getDashboardConfig().logLevel]) return;
  const line = `[${category}] ${message}`;
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];
  switch (level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

export const logger = {
  debug: (category: LogCategory, message: string, meta?: Record<string, unknown>) =>
    write('debug', category, message, meta),
  info: (category: LogCategory, message: string, meta?: Record<string, unknown>) =>
    write('info', category, message, meta),
  warn: (category: LogCategory, message: string, meta?: Record<string, unknown>) =>
    write('warn', category, message, meta),
  error: (category: LogCategory, message: string, meta?: Record<string, unknown>) =>
    write('error', category, message, meta),
};
