import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';

/** `ReadableStreamDefaultReader` のうち ByteReader が使う部分 */
export interface ChunkSource {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

/**
 * 上流のチャンク境界に関係なく、指定バイト数ちょうどを読み出す。
 *
 * EOF・中断・読み取り失敗・タイムアウトはすべて `null` で表す。
 * 一度 `null` を返したら以後も `null` を返す。
 */
export class ByteReader {
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(
    private readonly source: ChunkSource,
    private readonly logger: Logger,
    private readonly readTimeoutMs: number,
    private readonly onTimeout: () => void = () => {},
  ) {}

  get isEnded(): boolean {
    return this.ended;
  }

  async readExactly(length: number): Promise<Buffer | null> {
    if (this.ended) return null;
    while (this.buffered.length < length) {
      const chunk = await this.readChunk();
      if (!chunk) {
        this.ended = true;
        this.buffered = Buffer.alloc(0);
        return null;
      }
      this.buffered = this.buffered.length > 0 ? Buffer.concat([this.buffered, chunk]) : chunk;
    }

    const out = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    return out;
  }

  private async readChunk(): Promise<Buffer | null> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        this.onTimeout();
        reject(new Error(`no data for ${this.readTimeoutMs}ms`));
      }, this.readTimeoutMs);
    });

    try {
      const result = await Promise.race([this.source.read(), timeout]);
      if (result.done) return null;
      const value = result.value ?? new Uint8Array(0);
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
    } catch (err) {
      this.logger.debug(`Read aborted: ${errorMessage(err)}`);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
