import type { IcyMetadata } from '../stream/IcyMetadata.js';
import { formatClock } from './timecode.js';

export type ArtistTitle =
  | { kind: 'artist-title'; artist: string; title: string }
  | { kind: 'title-only'; artist: ''; title: string };

const ARTIST_SEPARATOR = /\s+-\s+/;

/**
 * 検出した1曲分の情報
 *
 * filePos は録音ファイル内のバイト位置 (ネットワーク上の位置ではない)、
 * timePos は録音開始からの経過秒。
 */
export class TrackInfo {
  constructor(
    readonly filePos: number,
    readonly timePos: number,
    readonly name: string,
    readonly cover: string = '',
  ) {
    Object.freeze(this);
  }

  static fromMetadata(filePos: number, timePos: number, metadata: IcyMetadata): TrackInfo {
    return new TrackInfo(filePos, timePos, metadata.streamtitle ?? '', metadata.streamurl ?? '');
  }

  /** "Artist - Title" を最初の区切りで分割する。区切りが無ければ全体がタイトル */
  artistTitle(): ArtistTitle {
    const match = ARTIST_SEPARATOR.exec(this.name);
    if (!match) {
      return { kind: 'title-only', artist: '', title: this.name };
    }
    return {
      kind: 'artist-title',
      artist: this.name.slice(0, match.index),
      title: this.name.slice(match.index + match[0].length),
    };
  }

  timePosString(): string {
    return formatClock(this.timePos);
  }
}
