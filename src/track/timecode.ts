/** CD の 1 秒あたりのフレーム数 */
export const CD_FRAMES_PER_SECOND = 75;

const pad = (value: number, width: number = 2) => String(value).padStart(width, '0');

/** `H:MM:SS` (時は0埋めしない) */
export function formatClock(seconds: number): string {
  const secs = Math.floor(Math.max(0, seconds));
  const h = Math.floor(secs / 3600);
  const m = Math.floor((secs % 3600) / 60);
  const s = secs % 60;
  return `${h}:${pad(m)}:${pad(s)}`;
}

/** 経過秒を CD フレーム数に切り捨てる */
export function toCdFrames(seconds: number): number {
  return Math.floor(Math.max(0, seconds) * CD_FRAMES_PER_SECOND);
}

/** キューシートの `mm:ss:ff` */
export function formatCueTime(seconds: number): string {
  const frames = toCdFrames(seconds);
  const mm = Math.floor(frames / (CD_FRAMES_PER_SECOND * 60));
  const ss = Math.floor(frames / CD_FRAMES_PER_SECOND) % 60;
  const ff = frames % CD_FRAMES_PER_SECOND;
  return `${pad(mm)}:${pad(ss)}:${pad(ff)}`;
}

/** Matroska チャプターの `HH:MM:SS.nnnnnnnnn` */
export function formatChapterTime(seconds: number): string {
  const totalNs = Math.floor(Math.max(0, seconds) * 1e9);
  const ns = totalNs % 1e9;
  const totalSecs = (totalNs - ns) / 1e9;
  const hh = Math.floor(totalSecs / 3600);
  const mm = Math.floor((totalSecs % 3600) / 60);
  const ss = totalSecs % 60;
  return `${pad(hh)}:${pad(mm)}:${pad(ss)}.${pad(ns, 9)}`;
}
