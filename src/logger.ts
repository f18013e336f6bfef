/**
 * `[Tag] message` 形式でコンソールに出力するロガー
 *
 * グローバルなロガーは持たず、各コンポーネントは生成時にハンドルを受け取る。
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  readonly tag: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** `[Parent/child]` タグを持つロガーを作る */
  child(tag: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const level = value?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

export function createLogger(tag: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    tag,
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`[${tag}] ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`[${tag}] ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`[${tag}] ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`[${tag}] ${message}`, ...args);
    },
    child(childTag) {
      return createLogger(`${tag}/${childTag}`, level);
    },
  };
}
