import { rm } from 'node:fs/promises';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { TrackInfo } from '../track/TrackInfo.js';

/**
 * 曲の切り替わりごとに呼ばれる出力先
 *
 * 実装は例外を呼び出し元に投げない。
 */
export interface TrackWriter {
  readonly path: string;
  addTrack(track: TrackInfo): Promise<void>;
  /** 何度呼んでもよい */
  close(): Promise<void>;
  /** 成果物を削除する (何も録音できなかったセッションの後始末) */
  remove(): Promise<void>;
}

/**
 * ファイルに書く TrackWriter の共通部分
 *
 * 書き込み失敗は最初の1回だけログに出し、以降は件数だけ数える。
 */
export abstract class FileWriter implements TrackWriter {
  private failures = 0;

  constructor(
    readonly path: string,
    protected readonly logger: Logger,
  ) {}

  abstract addTrack(track: TrackInfo): Promise<void>;

  async close(): Promise<void> {}

  async remove(): Promise<void> {
    try {
      await rm(this.path, { force: true });
    } catch (err) {
      this.logger.warn(`Removing '${this.path}' failed: ${errorMessage(err)}`);
    }
  }

  get failureCount(): number {
    return this.failures;
  }

  protected async guard(action: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (err) {
      if (this.failures === 0) {
        this.logger.error(`${action} '${this.path}' failed: ${errorMessage(err)}`);
      }
      this.failures++;
    }
  }
}
