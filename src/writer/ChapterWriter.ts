import { open, type FileHandle } from 'node:fs/promises';
import type { Logger } from '../logger.js';
import type { TrackInfo } from '../track/TrackInfo.js';
import { formatChapterTime } from '../track/timecode.js';
import { FileWriter } from './Writer.js';

export function xmlEscape(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * `.xml` Matroska チャプターファイル (mkvmerge --chapters で使える形式)
 *
 * 最初の書き込みでファイルを開いてヘッダーを書き、close() で閉じタグを書く。
 * 1曲も無くても close() すれば空の EditionEntry を持つ正しい文書になる。
 */
export class ChapterWriter extends FileWriter {
  private handle: FileHandle | null = null;
  private chapterUid = 1;
  private closed = false;

  constructor(
    path: string,
    logger: Logger,
    private readonly editionName?: string,
  ) {
    super(path, logger);
  }

  async addTrack(track: TrackInfo): Promise<void> {
    if (this.closed) {
      this.logger.warn(`Chapter file '${this.path}' already closed, dropping "${track.name}"`);
      return;
    }

    await this.guard('Writing chapters to', async () => {
      const handle = await this.ensureOpen();
      const split = track.artistTitle();
      const display = split.kind === 'artist-title' && split.artist
        ? `${split.artist} — ${split.title}`
        : split.title;

      const uid = this.chapterUid++;
      await handle.write(
        [
          '    <ChapterAtom>',
          `      <ChapterUID>${uid}</ChapterUID>`,
          `      <ChapterTimeStart>${formatChapterTime(track.timePos)}</ChapterTimeStart>`,
          '      <ChapterDisplay>',
          `        <ChapterString>${xmlEscape(display.trim())}</ChapterString>`,
          '      </ChapterDisplay>',
          '    </ChapterAtom>',
          '',
        ].join('\n'),
      );
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.guard('Finalizing chapters in', async () => {
      const handle = await this.ensureOpen();
      this.handle = null;
      try {
        await handle.write('  </EditionEntry>\n</Chapters>\n');
      } finally {
        await handle.close();
      }
    });
  }

  private async ensureOpen(): Promise<FileHandle> {
    if (this.handle) return this.handle;

    const handle = await open(this.path, 'w');
    const lines = ['<?xml version="1.0" encoding="UTF-8"?>', '<Chapters>', '  <EditionEntry>'];
    if (this.editionName) {
      lines.push(
        '    <EditionDisplay>',
        `      <EditionString>${xmlEscape(this.editionName)}</EditionString>`,
        '    </EditionDisplay>',
      );
    }
    try {
      await handle.write(lines.join('\n') + '\n');
    } catch (err) {
      await handle.close();
      throw err;
    }
    this.handle = handle;
    return handle;
  }
}
