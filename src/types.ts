import type { IcyMetadata } from './stream/IcyMetadata.js';

export const CUT_MODES = ['immediate', 'defer-to-next-track'] as const;

/** 録音の開始/終了をどこで切るか */
export type CutMode = (typeof CUT_MODES)[number];

/** 設定から解決済みのストリーム */
export interface StreamDescriptor {
  id: string;
  /** チャンネル表示名。ファイル名・ヘッダー・ログに使う */
  name: string;
  url: string;
  /** 出力ファイルの拡張子 (mp3, aac, ...) */
  type: string;
  cuesheet: boolean;
  tracklist: boolean;
}

export interface RecordingPolicy {
  endTime?: Date;
  startMode: CutMode;
  stopMode: CutMode;
  chapters: boolean;
}

export interface StreamChunk {
  /** 読み取りループ開始からの経過秒 (monotonic) */
  timestamp: number;
  audio: Buffer;
  /** このブロックにメタデータが無ければ空 */
  metadata: IcyMetadata;
}

/** Recorder が読むチャンク列の供給元 */
export interface StreamSource {
  open(): Promise<AsyncIterable<StreamChunk>>;
  stop(): void;
}
