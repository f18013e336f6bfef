/**
 * ICY (SHOUTcast) メタデータプロトコル
 *
 * - クライアントが `Icy-MetaData: 1` ヘッダーを送るとサーバーは `icy-metaint` を返す
 * - 以後 `icy-metaint` バイトのオーディオごとにメタデータブロックが挿入される
 * - メタデータブロック: [1バイト: 長さ/16] + [16バイト境界パディング済み文字列]
 * - メタデータがない場合は 0x00 の1バイトのみ
 *
 * 例: StreamTitle='Artist - Title';StreamUrl='http://example.com/cover.jpg';\0\0\0
 */

/** 小文字化したキー → 値 (出現順) */
export type IcyMetadata = Record<string, string>;

const SINGLE_QUOTED = /(\w+)='([^']*)'/g;
const DOUBLE_QUOTED = /(\w+)="([^"]*)"/g;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decode(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
  }
}

function trimNullPadding(block: Uint8Array): Uint8Array {
  let end = block.length;
  while (end > 0 && block[end - 1] === 0) end--;
  return block.subarray(0, end);
}

/**
 * メタデータブロックを key/value に分解する。
 * 壊れたブロックは例外にせず空の結果として扱う。
 */
export function parseIcyMetadata(block: Uint8Array): IcyMetadata {
  const raw = trimNullPadding(block);
  if (raw.length === 0) return {};

  const text = decode(raw);
  let matches = [...text.matchAll(SINGLE_QUOTED)];
  if (matches.length === 0) {
    matches = [...text.matchAll(DOUBLE_QUOTED)];
  }

  return Object.fromEntries(
    matches.map((m) => [m[1].trim().toLowerCase(), m[2].trim()]),
  );
}

export function createIcyMetadataBlock(title: string): Buffer {
  if (!title) {
    // メタデータなし: 長さ0の1バイト
    return Buffer.alloc(1, 0);
  }

  const text = `StreamTitle='${title}';`;
  const textBytes = Buffer.from(text, 'utf-8');
  const paddedLength = Math.ceil(textBytes.length / 16) * 16;
  const block = Buffer.alloc(1 + paddedLength, 0);
  block[0] = paddedLength / 16;
  textBytes.copy(block, 1);
  return block;
}

/**
 * オーディオデータを metaint バイトごとに区切り、その間にメタデータブロックを挿入する。
 *
 * タイトルが変わった直後の1ブロックだけ本文を送り、以降は長さ0のブロックを送る。
 */
export class IcyInterleaver {
  private bytesSinceLastMeta = 0;
  private pendingMetadata: Buffer;

  constructor(
    private readonly metaint: number,
    initialTitle: string = '',
  ) {
    this.pendingMetadata = createIcyMetadataBlock(initialTitle);
  }

  updateTitle(title: string): void {
    this.pendingMetadata = createIcyMetadataBlock(title);
  }

  process(audioChunk: Buffer): Buffer {
    const output: Buffer[] = [];
    let offset = 0;

    while (offset < audioChunk.length) {
      const remaining = this.metaint - this.bytesSinceLastMeta;
      const bytesToWrite = Math.min(remaining, audioChunk.length - offset);

      output.push(audioChunk.subarray(offset, offset + bytesToWrite));
      this.bytesSinceLastMeta += bytesToWrite;
      offset += bytesToWrite;

      if (this.bytesSinceLastMeta >= this.metaint) {
        output.push(this.pendingMetadata);
        this.pendingMetadata = createIcyMetadataBlock('');
        this.bytesSinceLastMeta = 0;
      }
    }

    return Buffer.concat(output);
  }
}
