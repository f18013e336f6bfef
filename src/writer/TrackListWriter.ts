import { appendFile } from 'node:fs/promises';
import type { TrackInfo } from '../track/TrackInfo.js';
import { FileWriter } from './Writer.js';

/** `.txt` 1曲1行: `H:MM:SS -- Artist - Title` */
export class TrackListWriter extends FileWriter {
  async addTrack(track: TrackInfo): Promise<void> {
    const line = `${track.timePosString()} -- ${track.name}\n`;
    await this.guard('Writing track list to', () => appendFile(this.path, line, 'utf-8'));
  }
}
