import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { TrackInfo } from '../track/TrackInfo.js';
import type { TrackWriter } from './Writer.js';

/** 未処理の曲がこの数に達したら警告する */
export const DEFAULT_BACKLOG_WARNING = 64;

/**
 * 曲情報を全 TrackWriter に配る
 *
 * セッションごとに1つのキューと1つのワーカーを持ち、曲の順番どおりに書き込む。
 * dispatch() は待たずに戻るので、ファイル I/O が遅くても受信ループは止まらない。
 * キューに上限は無く、曲を捨てることはない。
 */
export class TrackDispatcher {
  private queue: TrackInfo[] = [];
  private worker: Promise<void> | null = null;

  constructor(
    readonly writers: readonly TrackWriter[],
    private readonly logger: Logger,
    private readonly backlogWarning: number = DEFAULT_BACKLOG_WARNING,
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  dispatch(track: TrackInfo): void {
    if (this.writers.length === 0) return;

    this.queue.push(track);
    if (this.queue.length === this.backlogWarning) {
      this.logger.warn(`Dispatch backlog reached ${this.backlogWarning} tracks, writers are falling behind`);
    }
    if (!this.worker) {
      this.worker = this.run();
    }
  }

  async drain(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  async close(): Promise<void> {
    await this.drain();
    await Promise.all(this.writers.map((writer) => this.invoke(writer, 'close', () => writer.close())));
  }

  async remove(): Promise<void> {
    await Promise.all(this.writers.map((writer) => this.invoke(writer, 'remove', () => writer.remove())));
  }

  private async run(): Promise<void> {
    try {
      for (let track = this.queue.shift(); track; track = this.queue.shift()) {
        const current = track;
        await Promise.all(
          this.writers.map((writer) => this.invoke(writer, 'addTrack', () => writer.addTrack(current))),
        );
      }
    } finally {
      this.worker = null;
    }
  }

  private async invoke(writer: TrackWriter, operation: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.logger.error(`${operation} on '${writer.path}' failed: ${errorMessage(err)}`);
    }
  }
}
