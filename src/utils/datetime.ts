import { InvalidArgumentError } from '../errors.js';

const INTEGER_PATTERN = /^[+-]?\d+(_\d+)*$/;

/** 整数に変換できなければ fallback を返す ("1_000" のような区切りは許可) */
export function safeInt(text: string | null | undefined, fallback: number = 0): number {
  if (text == null) return fallback;
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return fallback;
  return Number.parseInt(trimmed.replace(/_/g, ''), 10);
}

const DATETIME_PATTERN = /^\s*(\d{4})-(\d{2})-(\d{2})(?:\s+|[tT])(?:(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?)?/;
const TIME_PATTERN = /^\s*(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?/;

function buildDate(year: number, month: number, day: number, hour: number, minute: number, second: number): Date | null {
  if (hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(year, month - 1, day, hour, minute, second);
  // Date は範囲外の日付を繰り上げるので、組み立て直した値と比較する
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * `YYYY-MM-DD HH:MM[:SS]` または `HH:MM[:SS]` (今日の日付) を解釈する
 */
export function parseDateTimeArg(text: string, now: Date = new Date()): Date {
  let date: Date | null = null;

  const full = DATETIME_PATTERN.exec(text);
  if (full) {
    date = buildDate(
      safeInt(full[1]), safeInt(full[2]), safeInt(full[3]),
      safeInt(full[4]), safeInt(full[5]), safeInt(full[6]),
    );
  } else {
    const time = TIME_PATTERN.exec(text);
    if (time) {
      date = buildDate(
        now.getFullYear(), now.getMonth() + 1, now.getDate(),
        safeInt(time[1]), safeInt(time[2]), safeInt(time[3]),
      );
    }
  }

  if (!date) {
    throw new InvalidArgumentError(
      `Given date/time '${text}' is not valid. Expected format: [YYYY-MM-DD] HH:MM[:SS]`,
    );
  }
  return date;
}
