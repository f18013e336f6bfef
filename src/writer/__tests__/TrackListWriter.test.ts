import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { TrackListWriter } from '../TrackListWriter.js';
import { TrackInfo } from '../../track/TrackInfo.js';
import { createTestLogger } from '../../__tests__/helpers/logger.js';

describe('TrackListWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracklist-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should append one line per track', async () => {
    const file = path.join(dir, 'a.txt');
    const writer = new TrackListWriter(file, createTestLogger());

    await writer.addTrack(new TrackInfo(0, 0, 'Artist A - One'));
    await writer.addTrack(new TrackInfo(8192, 3661.9, 'Two'));
    await writer.close();

    expect(await fs.readFile(file, 'utf-8')).toBe('0:00:00 -- Artist A - One\n1:01:01 -- Two\n');
  });

  it('should not throw when the file cannot be written', async () => {
    const logger = createTestLogger();
    const writer = new TrackListWriter(path.join(dir, 'missing', 'a.txt'), logger);

    await expect(writer.addTrack(new TrackInfo(0, 0, 'One'))).resolves.toBeUndefined();
    await expect(writer.addTrack(new TrackInfo(0, 0, 'Two'))).resolves.toBeUndefined();

    expect(writer.failureCount).toBe(2);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
