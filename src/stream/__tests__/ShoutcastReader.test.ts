import { describe, it, expect, afterEach } from 'vitest';
import { ShoutcastReader } from '../ShoutcastReader.js';
import { ConnectionError } from '../../errors.js';
import type { StreamChunk, StreamDescriptor } from '../../types.js';
import { createTestLogger } from '../../__tests__/helpers/logger.js';
import { audioBlock, startIcyServer, type IcyTestServer } from '../../__tests__/helpers/icy-server.js';

const METAINT = 16;

function descriptor(url: string): StreamDescriptor {
  return { id: 'test', name: 'Test Station', url, type: 'mp3', cuesheet: false, tracklist: false };
}

async function collect(chunks: AsyncIterable<StreamChunk>): Promise<StreamChunk[]> {
  const out: StreamChunk[] = [];
  for await (const c of chunks) out.push(c);
  return out;
}

describe('ShoutcastReader', () => {
  let server: IcyTestServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('should split the stream into audio blocks and metadata', async () => {
    server = await startIcyServer({
      metaint: METAINT,
      blocks: [
        { audio: audioBlock(1, METAINT), title: 'Artist A - One' },
        { audio: audioBlock(2, METAINT) },
        { audio: audioBlock(3, METAINT), title: 'Artist B - Two' },
      ],
    });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    const chunks = await collect(await reader.open());

    expect(chunks.map((c) => c.audio)).toEqual([audioBlock(1, METAINT), audioBlock(2, METAINT), audioBlock(3, METAINT)]);
    expect(chunks.map((c) => c.metadata)).toEqual([
      { streamtitle: 'Artist A - One' },
      {},
      { streamtitle: 'Artist B - Two' },
    ]);
    expect(chunks[0].timestamp).toBe(0);
    expect(chunks[1].timestamp).toBeGreaterThanOrEqual(chunks[0].timestamp);
    expect(chunks[2].timestamp).toBeGreaterThanOrEqual(chunks[1].timestamp);
  });

  it('should request inline metadata', async () => {
    server = await startIcyServer({ metaint: METAINT, blocks: [] });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    await collect(await reader.open());

    expect(server.requestHeaders[0]['icy-metadata']).toBe('1');
    expect(server.requestHeaders[0]['user-agent']).toMatch(/^icy-recorder\//);
  });

  it('should suppress repeated identical metadata', async () => {
    server = await startIcyServer({
      metaint: METAINT,
      blocks: [
        { audio: audioBlock(1, METAINT), title: 'Same - Song' },
        { audio: audioBlock(2, METAINT), title: 'Same - Song' },
        { audio: audioBlock(3, METAINT), title: 'Other - Song' },
        { audio: audioBlock(4, METAINT), title: 'Same - Song' },
      ],
    });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    const chunks = await collect(await reader.open());

    expect(chunks.map((c) => c.metadata.streamtitle ?? null)).toEqual(['Same - Song', null, 'Other - Song', 'Same - Song']);
  });

  it('should end the sequence on a truncated block', async () => {
    server = await startIcyServer({
      metaint: METAINT,
      blocks: [{ audio: audioBlock(1, METAINT), title: 'Only' }],
      trailer: audioBlock(9, METAINT / 2),
    });
    const logger = createTestLogger();
    const reader = new ShoutcastReader(descriptor(server.url), logger);

    const chunks = await collect(await reader.open());

    expect(chunks).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('Stream ended/EOF');
  });

  it('should fail with ConnectionError on a non-success status', async () => {
    server = await startIcyServer({ metaint: METAINT, blocks: [], status: 404 });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    await expect(reader.open()).rejects.toThrow(ConnectionError);
    await expect(reader.open()).rejects.toThrow('Request failed, status: 404');
  });

  it('should fail with ConnectionError when icy-metaint is missing', async () => {
    server = await startIcyServer({ metaint: METAINT, blocks: [], sendMetaint: false });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    await expect(reader.open()).rejects.toThrow('No embedded metadata (missing or invalid icy-metaint)');
  });

  it('should fail with ConnectionError when the host is unreachable', async () => {
    const closed = await startIcyServer({ metaint: METAINT, blocks: [] });
    await closed.close();
    const reader = new ShoutcastReader(descriptor(closed.url), createTestLogger());

    await expect(reader.open()).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should unblock a pending read when stopped', async () => {
    server = await startIcyServer({
      metaint: METAINT,
      blocks: [{ audio: audioBlock(1, METAINT), title: 'Live' }],
      hold: true,
    });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());
    const chunks = await reader.open();

    const first = await chunks.next();
    expect(first.done).toBe(false);

    const pending = chunks.next();
    reader.stop();
    reader.stop();

    expect(await pending).toEqual({ done: true, value: undefined });
  });

  it('should yield nothing when stopped before connecting', async () => {
    server = await startIcyServer({ metaint: METAINT, blocks: [{ audio: audioBlock(1, METAINT) }] });
    const reader = new ShoutcastReader(descriptor(server.url), createTestLogger());

    reader.stop();
    const chunks = await collect(await reader.open());

    expect(chunks).toEqual([]);
  });
});
