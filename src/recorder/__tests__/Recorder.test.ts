import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Recorder } from '../Recorder.js';
import { ConnectionError } from '../../errors.js';
import type { RecordingPolicy, StreamChunk, StreamDescriptor } from '../../types.js';
import { createTestLogger } from '../../__tests__/helpers/logger.js';
import { FakeSource, chunk } from '../../__tests__/helpers/fake-source.js';
import { audioBlock, startIcyServer, type IcyTestServer } from '../../__tests__/helpers/icy-server.js';

const STARTED_AT = new Date(2025, 8, 24, 13, 0, 0);
const AUDIO_FILE = 'Main_Mix_20250924-130000.mp3';

const stream: StreamDescriptor = {
  id: 'main',
  name: 'Main Mix',
  url: 'http://127.0.0.1:1/stream',
  type: 'mp3',
  cuesheet: false,
  tracklist: true,
};

function policy(overrides: Partial<RecordingPolicy> = {}): RecordingPolicy {
  return { startMode: 'immediate', stopMode: 'immediate', chapters: false, ...overrides };
}

function secondsAfterStart(seconds: number): Date {
  return new Date(STARTED_AT.getTime() + seconds * 1000);
}

describe('Recorder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'recorder-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function createRecorder(source: FakeSource, recordingPolicy: RecordingPolicy): Recorder {
    return new Recorder({
      stream,
      policy: recordingPolicy,
      targetDir: dir,
      logger: createTestLogger(),
      createSource: () => source,
      now: () => STARTED_AT,
    });
  }

  const fourChunks = (): StreamChunk[] => [
    chunk(0, 1, 'Artist A - One'),
    chunk(1, 2),
    chunk(2, 3, 'Artist B - Two'),
    chunk(3, 4),
  ];

  it('should record everything in immediate mode', async () => {
    const recorder = createRecorder(new FakeSource(fourChunks()), policy());

    const result = await recorder.record();

    expect(result.audioFile).toBe(path.join(dir, AUDIO_FILE));
    expect(result.bytesWritten).toBe(16);
    expect(result.reason).toBe('stream-ended');
    expect(result.tracks.map((t) => [t.filePos, t.timePos, t.name])).toEqual([
      [0, 0, 'Artist A - One'],
      [8, 2, 'Artist B - Two'],
    ]);
    expect(await fs.readFile(result.audioFile)).toEqual(
      Buffer.from([1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4]),
    );
    expect(await fs.readFile(path.join(dir, 'Main_Mix_20250924-130000.txt'), 'utf-8')).toBe(
      '0:00:00 -- Artist A - One\n0:00:02 -- Artist B - Two\n',
    );
    expect(result.artifacts).toEqual([path.join(dir, 'Main_Mix_20250924-130000.txt')]);
    expect(recorder.state).toBe('stopped');
  });

  it('should skip the partial first track when deferring the start', async () => {
    const source = new FakeSource([
      chunk(0, 1, 'Partial'),
      chunk(1, 2, 'Full'),
      chunk(2, 3),
      chunk(3, 4),
    ]);
    const recorder = createRecorder(source, policy({ startMode: 'defer-to-next-track' }));
    expect(recorder.state).toBe('skipping');

    const result = await recorder.record();

    expect(await fs.readFile(result.audioFile)).toEqual(Buffer.from([2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4]));
    expect(result.tracks.map((t) => [t.filePos, t.timePos, t.name])).toEqual([[0, 0, 'Full']]);
  });

  it('should finish the current track when deferring the stop', async () => {
    const source = new FakeSource([
      chunk(0, 1, 'Artist A - One'),
      chunk(1, 2),
      chunk(2, 3),
      chunk(3, 4, 'Artist B - Two'),
      chunk(4, 5),
    ]);
    const recorder = createRecorder(
      source,
      policy({ stopMode: 'defer-to-next-track', endTime: secondsAfterStart(1.5) }),
    );

    const result = await recorder.record();

    expect(result.reason).toBe('track-boundary');
    expect(result.bytesWritten).toBe(12);
    expect(await fs.readFile(result.audioFile)).toEqual(Buffer.from([1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3]));
    expect(result.tracks.map((t) => t.name)).toEqual(['Artist A - One']);
    expect(source.stopCalls).toBeGreaterThan(0);
  });

  it('should stop at a track change that coincides with the end time', async () => {
    const source = new FakeSource([...fourChunks(), chunk(4, 5)]);
    const recorder = createRecorder(
      source,
      policy({ stopMode: 'defer-to-next-track', endTime: secondsAfterStart(2) }),
    );

    const result = await recorder.record();

    expect(result.reason).toBe('track-boundary');
    expect(result.bytesWritten).toBe(8);
  });

  it('should stop at the end time in immediate mode', async () => {
    const recorder = createRecorder(new FakeSource(fourChunks()), policy({ endTime: secondsAfterStart(2) }));

    const result = await recorder.record();

    expect(result.reason).toBe('end-time');
    expect(result.bytesWritten).toBe(8);
    expect(await fs.readFile(result.audioFile)).toEqual(Buffer.from([1, 1, 1, 1, 2, 2, 2, 2]));
  });

  it('should write chapters when enabled', async () => {
    const recorder = createRecorder(new FakeSource(fourChunks()), policy({ chapters: true }));

    const result = await recorder.record();

    const xml = await fs.readFile(path.join(dir, 'Main_Mix_20250924-130000.xml'), 'utf-8');
    expect(xml).toContain('<EditionString>Main Mix</EditionString>');
    expect(xml).toContain('<ChapterString>Artist B — Two</ChapterString>');
    expect(xml).toContain('<ChapterTimeStart>00:00:02.000000000</ChapterTimeStart>');
    expect(result.artifacts).toHaveLength(2);
  });

  it('should remove all output when no audio was written', async () => {
    const source = new FakeSource([chunk(0, 1, 'Partial'), chunk(1, 2)]);
    const recorder = createRecorder(source, policy({ startMode: 'defer-to-next-track', chapters: true }));

    const result = await recorder.record();

    expect(result.bytesWritten).toBe(0);
    expect(result.reason).toBe('stream-ended');
    expect(result.tracks).toEqual([]);
    expect(result.artifacts).toEqual([]);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should give up when the end time passes before anything was recorded', async () => {
    const source = new FakeSource([chunk(0, 1, 'Partial'), chunk(1, 2), chunk(2, 3)]);
    const recorder = createRecorder(
      source,
      policy({ startMode: 'defer-to-next-track', stopMode: 'defer-to-next-track', endTime: secondsAfterStart(1) }),
    );

    const result = await recorder.record();

    expect(result.reason).toBe('nothing-recorded');
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should not create files when the connection fails', async () => {
    const source = new FakeSource([], { openError: new ConnectionError('Request failed, status: 404') });
    const recorder = createRecorder(source, policy());

    await expect(recorder.record()).rejects.toBeInstanceOf(ConnectionError);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should stop on request', async () => {
    const source = new FakeSource([chunk(0, 1, 'One'), chunk(1, 2)], { hold: true });
    const recorder = createRecorder(source, policy());

    const pending = recorder.record();
    await source.holding;
    recorder.stop();
    const result = await pending;

    expect(result.reason).toBe('stopped');
    expect(result.bytesWritten).toBe(8);
  });

  describe('with a live stream', () => {
    let server: IcyTestServer | null = null;

    afterEach(async () => {
      await server?.close();
      server = null;
    });

    it('should record an ICY stream into audio, track list and chapters', async () => {
      server = await startIcyServer({
        metaint: 16,
        blocks: [
          { audio: audioBlock(1, 16), title: 'Artist A - One' },
          { audio: audioBlock(2, 16) },
          { audio: audioBlock(3, 16), title: 'Artist B - Two' },
        ],
      });
      const recorder = new Recorder({
        stream: { ...stream, url: server.url },
        policy: policy({ chapters: true }),
        targetDir: dir,
        logger: createTestLogger(),
        now: () => STARTED_AT,
      });

      const result = await recorder.record();

      expect(result.reason).toBe('stream-ended');
      expect(await fs.readFile(result.audioFile)).toEqual(
        Buffer.concat([audioBlock(1, 16), audioBlock(2, 16), audioBlock(3, 16)]),
      );
      expect(result.tracks.map((t) => [t.filePos, t.name])).toEqual([
        [0, 'Artist A - One'],
        [32, 'Artist B - Two'],
      ]);
      const trackList = await fs.readFile(path.join(dir, 'Main_Mix_20250924-130000.txt'), 'utf-8');
      expect(trackList.trimEnd().split('\n')).toHaveLength(2);
      const xml = await fs.readFile(path.join(dir, 'Main_Mix_20250924-130000.xml'), 'utf-8');
      expect(xml).toContain('<ChapterUID>1</ChapterUID>');
      expect(xml).toContain('<ChapterUID>2</ChapterUID>');
    });
  });
});
