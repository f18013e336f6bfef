import path from 'node:path';

/** ファイル名に使えない文字を `_` に置き換え、連続する `_` をまとめる */
export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_.()[\]-]/g, '_').replace(/_{2,}/g, '_');
}

const pad = (value: number) => String(value).padStart(2, '0');

/** ローカル時刻の `YYYYMMDD-HHMMSS` */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function recordingFileName(streamName: string, type: string, startedAt: Date): string {
  return `${sanitizeName(streamName)}_${formatFileTimestamp(startedAt)}.${type || 'dat'}`;
}

/** 拡張子を差し替える (`ext` は `.cue` のようにドット付き) */
export function withExtension(file: string, ext: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}${ext}`);
}
