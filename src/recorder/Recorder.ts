import path from 'node:path';
import { open, rm, type FileHandle } from 'node:fs/promises';
import { OutputError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { ShoutcastReader } from '../stream/ShoutcastReader.js';
import { TrackInfo } from '../track/TrackInfo.js';
import type { RecordingPolicy, StreamDescriptor, StreamSource } from '../types.js';
import { recordingFileName, withExtension } from '../utils/filename.js';
import { ChapterWriter } from '../writer/ChapterWriter.js';
import { CueSheetWriter } from '../writer/CueSheetWriter.js';
import { TrackDispatcher } from '../writer/TrackDispatcher.js';
import { TrackListWriter } from '../writer/TrackListWriter.js';
import type { TrackWriter } from '../writer/Writer.js';

/**
 * - skipping: 最初の(途中からの)曲を読み飛ばしている
 * - recording: 書き込み中
 * - stopping-at-boundary: 終了時刻を過ぎ、次の曲の切り替わりを待っている
 * - stopped: 終了
 */
export type RecorderState = 'skipping' | 'recording' | 'stopping-at-boundary' | 'stopped';

export type StopReason =
  | 'end-time'
  | 'track-boundary'
  | 'nothing-recorded'
  | 'stream-ended'
  | 'stopped'
  | 'write-failed';

export interface RecordingResult {
  audioFile: string;
  bytesWritten: number;
  /** ライターに渡した曲 */
  tracks: TrackInfo[];
  reason: StopReason;
  /** 残っている副次ファイル (何も録音できなかった場合は空) */
  artifacts: string[];
}

export interface RecorderOptions {
  stream: StreamDescriptor;
  policy: RecordingPolicy;
  targetDir: string;
  logger: Logger;
  createSource?: (stream: StreamDescriptor, logger: Logger) => StreamSource;
  now?: () => Date;
}

/**
 * 1ストリーム・1セッション分の録音
 *
 * チャンクを順に読み、開始/終了の切り方に従ってオーディオを書き込み、
 * 曲が変わるたびに TrackInfo をライターへ渡す。
 */
export class Recorder {
  private currentState: RecorderState;
  private source: StreamSource | null = null;
  private stopRequested = false;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createSource: (stream: StreamDescriptor, logger: Logger) => StreamSource;

  constructor(private readonly options: RecorderOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.createSource = options.createSource ?? ((stream, logger) => new ShoutcastReader(stream, logger));
    this.currentState = this.initialState();
  }

  get state(): RecorderState {
    return this.currentState;
  }

  /** 外部からの停止要求。次の読み取りで受信ループを抜ける */
  stop(): void {
    this.stopRequested = true;
    this.source?.stop();
  }

  async record(): Promise<RecordingResult> {
    const { stream, policy, targetDir } = this.options;
    const source = this.createSource(stream, this.logger);
    this.source = source;
    if (this.stopRequested) source.stop();

    const startTime = this.now();
    // ConnectionError はそのまま呼び出し元へ (この時点ではファイルを作っていない)
    const chunks = await source.open();

    const audioFile = path.join(targetDir, recordingFileName(stream.name, stream.type, startTime));
    let target: FileHandle;
    try {
      target = await open(audioFile, 'w');
    } catch (err) {
      source.stop();
      throw new OutputError(`Cannot create '${audioFile}': ${errorMessage(err)}`);
    }

    const dispatcher = new TrackDispatcher(this.createWriters(audioFile), this.logger);
    const tracks: TrackInfo[] = [];
    let reason: StopReason = 'stream-ended';
    let filePos = 0;
    let trackNo = 0;
    let recordStart = 0;

    this.logger.info(`Recording into '${audioFile}'`);
    try {
      for await (const chunk of chunks) {
        const blockTime = startTime.getTime() + chunk.timestamp * 1000;

        if (policy.endTime && blockTime >= policy.endTime.getTime()) {
          if (policy.stopMode === 'immediate') {
            reason = 'end-time';
            break;
          }
          if (this.currentState !== 'stopping-at-boundary') {
            if (filePos === 0) {
              reason = 'nothing-recorded';
              break;
            }
            this.logger.info('Stopping at track end');
            this.currentState = 'stopping-at-boundary';
          }
        }

        if (Object.keys(chunk.metadata).length > 0) {
          trackNo++;
          if (this.currentState === 'stopping-at-boundary') {
            reason = 'track-boundary';
            break;
          }
          if (this.currentState === 'skipping' && trackNo > 1) {
            this.currentState = 'recording';
            recordStart = chunk.timestamp;
          }

          const track = TrackInfo.fromMetadata(filePos, chunk.timestamp - recordStart, chunk.metadata);
          if (this.currentState === 'recording') {
            tracks.push(track);
            dispatcher.dispatch(track);
            this.logger.info(`Recording: "${track.name}" @ ${track.timePosString()}`);
          } else {
            this.logger.info(`Skipping: "${track.name}"`);
          }
        }

        if (this.currentState === 'recording' || this.currentState === 'stopping-at-boundary') {
          const { bytesWritten } = await target.write(chunk.audio);
          filePos += bytesWritten;
        }
      }
      if (reason === 'stream-ended' && this.stopRequested) {
        reason = 'stopped';
      }
    } catch (err) {
      reason = 'write-failed';
      this.logger.error(`Writing '${audioFile}' failed: ${errorMessage(err)}`);
    } finally {
      this.currentState = 'stopped';
      source.stop();
      await this.teardown(target, audioFile, dispatcher, filePos);
    }

    this.logger.info(`Finished (${reason}): ${filePos} bytes, ${tracks.length} tracks`);
    return {
      audioFile,
      bytesWritten: filePos,
      tracks,
      reason,
      artifacts: filePos > 0 ? dispatcher.writers.map((w) => w.path) : [],
    };
  }

  private initialState(): RecorderState {
    return this.options.policy.startMode === 'immediate' ? 'recording' : 'skipping';
  }

  private createWriters(audioFile: string): TrackWriter[] {
    const { stream, policy } = this.options;
    const writers: TrackWriter[] = [];

    if (stream.cuesheet) {
      writers.push(
        new CueSheetWriter(stream.name, path.basename(audioFile), withExtension(audioFile, '.cue'), this.logger),
      );
    }
    if (stream.tracklist) {
      writers.push(new TrackListWriter(withExtension(audioFile, '.txt'), this.logger));
    }
    if (policy.chapters) {
      writers.push(new ChapterWriter(withExtension(audioFile, '.xml'), this.logger, stream.name));
    }
    return writers;
  }

  /** 何も書けなかった場合はオーディオも副次ファイルも残さない */
  private async teardown(
    target: FileHandle,
    audioFile: string,
    dispatcher: TrackDispatcher,
    filePos: number,
  ): Promise<void> {
    try {
      await target.close();
    } catch (err) {
      this.logger.error(`Closing '${audioFile}' failed: ${errorMessage(err)}`);
    }

    await dispatcher.close();

    if (filePos === 0) {
      this.logger.info('Nothing recorded, removing output files');
      try {
        await rm(audioFile, { force: true });
      } catch (err) {
        this.logger.error(`Removing '${audioFile}' failed: ${errorMessage(err)}`);
      }
      await dispatcher.remove();
    }
  }
}
