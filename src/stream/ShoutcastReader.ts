import { ConnectionError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { StreamChunk, StreamDescriptor, StreamSource } from '../types.js';
import { USER_AGENT } from '../version.js';
import { ByteReader } from './ByteReader.js';
import { parseIcyMetadata, type IcyMetadata } from './IcyMetadata.js';

export interface ShoutcastReaderOptions {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_READ_TIMEOUT_MS = 60_000;

/**
 * ICY ストリームを受信し、オーディオとメタデータの組に分解する
 *
 * 1サイクル = `icy-metaint` バイトのオーディオ + 長さバイト + メタデータ本文。
 * サイクルごとに StreamChunk を1つ返す。
 */
export class ShoutcastReader implements StreamSource {
  private abortController: AbortController | null = null;
  private active = false;
  private stopped = false;
  private lastMetadataKey = '';
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;

  constructor(
    private readonly stream: StreamDescriptor,
    private readonly logger: Logger,
    options: ShoutcastReaderOptions = {},
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  /**
   * 接続して icy-metaint を確認する。
   * ステータス異常・metaint 無しは ConnectionError。
   */
  async open(): Promise<AsyncGenerator<StreamChunk, void, undefined>> {
    const controller = new AbortController();
    this.abortController = controller;
    if (this.stopped) controller.abort();

    const connectTimer = setTimeout(() => controller.abort(), this.connectTimeoutMs);
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(this.stream.url, {
        headers: { 'Icy-MetaData': '1', 'User-Agent': USER_AGENT },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (err) {
      if (this.stopped) {
        this.logger.debug('Stopped while connecting');
        return this.nothing();
      }
      throw new ConnectionError(`Request to ${this.stream.url} failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(connectTimer);
    }

    if (!response.ok) {
      controller.abort();
      throw new ConnectionError(`Request failed, status: ${response.status}`);
    }

    const blockSize = Number(response.headers.get('icy-metaint') ?? '');
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      controller.abort();
      throw new ConnectionError('No embedded metadata (missing or invalid icy-metaint)');
    }
    if (!response.body) {
      controller.abort();
      throw new ConnectionError('Response has no body');
    }

    this.logger.debug(`Stream blocksize: ${blockSize} bytes`);
    const reader = new ByteReader(
      response.body.getReader(),
      this.logger,
      this.readTimeoutMs,
      () => {
        this.logger.warn(`No data for ${this.readTimeoutMs}ms, aborting`);
        controller.abort();
      },
    );
    this.active = !this.stopped;
    return this.frames(reader, blockSize);
  }

  /** 何度呼んでもよい。ブロック中の読み取りは即座に中断される */
  stop(): void {
    this.stopped = true;
    this.active = false;
    this.abortController?.abort();
  }

  private async *nothing(): AsyncGenerator<StreamChunk, void, undefined> {}

  private async *frames(reader: ByteReader, blockSize: number): AsyncGenerator<StreamChunk, void, undefined> {
    const startTime = performance.now();
    let blockTime = 0;

    try {
      while (this.active) {
        blockTime = blockTime === 0 ? startTime : performance.now();

        const audio = await reader.readExactly(blockSize);
        if (!audio) return this.logEnd();
        const lengthByte = await reader.readExactly(1);
        if (!lengthByte) return this.logEnd();

        const metaLength = lengthByte.readUInt8(0) * 16;
        let metadata: IcyMetadata = {};
        if (metaLength > 0) {
          const block = await reader.readExactly(metaLength);
          if (!block) return this.logEnd();
          metadata = this.suppressRepeat(parseIcyMetadata(block));
        }

        yield { timestamp: (blockTime - startTime) / 1000, audio, metadata };
      }
    } finally {
      this.active = false;
      this.abortController?.abort();
    }
  }

  /** 同じ内容のメタデータが続いた場合は新しい曲として扱わない */
  private suppressRepeat(metadata: IcyMetadata): IcyMetadata {
    const entries = Object.entries(metadata);
    if (entries.length === 0) return metadata;

    const key = JSON.stringify(entries);
    if (key === this.lastMetadataKey) {
      this.logger.debug('Metadata unchanged, ignoring repeat');
      return {};
    }
    this.lastMetadataKey = key;
    return metadata;
  }

  private logEnd(): void {
    if (this.stopped) {
      this.logger.debug('Stream reader stopped');
    } else {
      this.logger.warn('Stream ended/EOF');
    }
  }
}
