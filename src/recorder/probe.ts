import { parseFile } from 'music-metadata';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

export interface AudioSummary {
  container: string | null;
  codec: string | null;
  /** bit/s */
  bitrate: number | null;
  /** 秒 (ヘッダーから推定できない場合は null) */
  duration: number | null;
}

/**
 * 録音済みファイルのフォーマット情報を読む。読めなければ null。
 */
export async function probeRecording(file: string, logger: Logger): Promise<AudioSummary | null> {
  try {
    const { format } = await parseFile(file, { duration: true, skipCovers: true });
    return {
      container: format.container ?? null,
      codec: format.codec ?? null,
      bitrate: format.bitrate ?? null,
      duration: format.duration ?? null,
    };
  } catch (err) {
    logger.warn(`Probing '${file}' failed: ${errorMessage(err)}`);
    return null;
  }
}
