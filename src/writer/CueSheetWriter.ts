import { appendFile } from 'node:fs/promises';
import type { Logger } from '../logger.js';
import type { TrackInfo } from '../track/TrackInfo.js';
import { formatCueTime } from '../track/timecode.js';
import { FileWriter } from './Writer.js';

/** キューシートのトラック番号の上限 */
const MAX_TRACK_NO = 99;

/**
 * `.cue` キューシート
 *
 * 99曲を超えると番号を 01 に戻し、空行とヘッダーを挟んで続ける。
 */
export class CueSheetWriter extends FileWriter {
  private trackNo = 1;

  constructor(
    private readonly performer: string,
    private readonly audioFileName: string,
    path: string,
    logger: Logger,
  ) {
    super(path, logger);
  }

  async addTrack(track: TrackInfo): Promise<void> {
    const entry = this.trackEntry(track);
    await this.guard('Writing cuesheet to', () => appendFile(this.path, `${entry}\n`, 'utf-8'));
  }

  private header(): string {
    return [`PERFORMER "${this.performer}"`, `FILE "${this.audioFileName}" WAVE`].join('\n');
  }

  private trackEntry(track: TrackInfo): string {
    let prefix = '';
    if (this.trackNo > MAX_TRACK_NO) {
      this.trackNo = 1;
      prefix = '\n';
    }

    const { artist, title } = track.artistTitle();
    let entry = [
      `  TRACK ${String(this.trackNo).padStart(2, '0')} AUDIO`,
      `    TITLE "${title}"`,
      `    PERFORMER "${artist}"`,
      `    INDEX 01 ${formatCueTime(track.timePos)}`,
      `    REM FILEPOS ${track.filePos}`,
      `    REM COVER "${track.cover}"`,
    ].join('\n');

    if (this.trackNo === 1) {
      entry = prefix + [this.header(), entry].join('\n');
    }
    this.trackNo++;
    return entry;
  }
}
