import crypto from 'node:crypto';
import fs from 'node:fs';
import type { AppConfig } from '../config.js';
import { resolveStreams } from '../config.js';
import {
  InvalidArgumentError,
  InvalidOperationError,
  SessionNotFoundError,
  StreamNotFoundError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { CutMode, StreamDescriptor } from '../types.js';
import { Recorder, type RecorderOptions, type StopReason } from './Recorder.js';
import { probeRecording, type AudioSummary } from './probe.js';

export interface StartRecordingRequest {
  /** endTime と duration のどちらか */
  endTime?: Date;
  /** 秒 */
  duration?: number;
  startMode?: CutMode;
  stopMode?: CutMode;
}

export type SessionStatus = 'running' | 'finished' | 'failed';

export interface SessionInfo {
  id: string;
  streamId: string;
  streamName: string;
  status: SessionStatus;
  startedAt: string;
  endTime: string | null;
  finishedAt: string | null;
  audioFile: string | null;
  bytesWritten: number;
  tracks: number;
  reason: StopReason | null;
  error: string | null;
  summary: AudioSummary | null;
}

interface Session {
  info: SessionInfo;
  recorder: Recorder;
  done: Promise<SessionInfo>;
}

export interface RecordingManagerOptions {
  outputDir: string;
  createRecorder?: (options: RecorderOptions) => Recorder;
  probe?: (file: string, logger: Logger) => Promise<AudioSummary | null>;
  now?: () => Date;
}

const MAX_FINISHED_SESSIONS = 50;

/**
 * 録音セッションの管理
 *
 * ストリームごとに独立した Recorder を動かす。セッション間で状態は共有しない。
 */
export class RecordingManager {
  private sessions = new Map<string, Session>();
  private streams: Map<string, StreamDescriptor>;
  private readonly createRecorder: (options: RecorderOptions) => Recorder;
  private readonly probe: (file: string, logger: Logger) => Promise<AudioSummary | null>;
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly options: RecordingManagerOptions,
  ) {
    this.streams = new Map(resolveStreams(config).map((s) => [s.id, s]));
    this.createRecorder = options.createRecorder ?? ((opts) => new Recorder(opts));
    this.probe = options.probe ?? probeRecording;
    this.now = options.now ?? (() => new Date());
  }

  getStreams(): StreamDescriptor[] {
    return [...this.streams.values()];
  }

  start(streamId: string, request: StartRecordingRequest = {}): SessionInfo {
    const stream = this.streams.get(streamId);
    if (!stream) throw new StreamNotFoundError(streamId);

    for (const session of this.sessions.values()) {
      if (session.info.streamId === streamId && session.info.status === 'running') {
        throw new InvalidOperationError(`Stream '${streamId}' is already being recorded (session ${session.info.id})`);
      }
    }

    const startedAt = this.now();
    const endTime = this.resolveEndTime(startedAt, request);
    const id = crypto.randomUUID();
    const logger = this.logger.child(stream.name);

    fs.mkdirSync(this.options.outputDir, { recursive: true });
    const recorder = this.createRecorder({
      stream,
      policy: {
        endTime,
        startMode: request.startMode ?? this.config.recording.startMode,
        stopMode: request.stopMode ?? this.config.recording.stopMode,
        chapters: this.config.recording.chapters,
      },
      targetDir: this.options.outputDir,
      logger,
    });

    const info: SessionInfo = {
      id,
      streamId,
      streamName: stream.name,
      status: 'running',
      startedAt: startedAt.toISOString(),
      endTime: endTime ? endTime.toISOString() : null,
      finishedAt: null,
      audioFile: null,
      bytesWritten: 0,
      tracks: 0,
      reason: null,
      error: null,
      summary: null,
    };

    const done = this.run(info, recorder, logger);
    this.sessions.set(id, { info, recorder, done });
    logger.info(`Session ${id} started${endTime ? `, recording until ${endTime.toISOString()}` : ''}`);
    return { ...info };
  }

  stop(id: string): SessionInfo {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    if (session.info.status === 'running') {
      this.logger.info(`Stopping session ${id}`);
      session.recorder.stop();
    }
    return { ...session.info };
  }

  async stopAll(): Promise<void> {
    const running = [...this.sessions.values()].filter((s) => s.info.status === 'running');
    for (const session of running) {
      session.recorder.stop();
    }
    await Promise.all(running.map((s) => s.done));
  }

  get(id: string): SessionInfo {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return { ...session.info };
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map((s) => ({ ...s.info }));
  }

  async wait(id: string): Promise<SessionInfo> {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return { ...(await session.done) };
  }

  getActiveCount(): number {
    return [...this.sessions.values()].filter((s) => s.info.status === 'running').length;
  }

  private resolveEndTime(startedAt: Date, request: StartRecordingRequest): Date | undefined {
    if (request.endTime && request.duration !== undefined) {
      throw new InvalidArgumentError('Specify either endTime or duration, not both');
    }
    if (request.duration !== undefined) {
      if (!(request.duration > 0)) {
        throw new InvalidArgumentError(`Duration must be positive: ${request.duration}`);
      }
      return new Date(startedAt.getTime() + request.duration * 1000);
    }
    return request.endTime;
  }

  private async run(info: SessionInfo, recorder: Recorder, logger: Logger): Promise<SessionInfo> {
    try {
      const result = await recorder.record();
      info.status = 'finished';
      info.audioFile = result.bytesWritten > 0 ? result.audioFile : null;
      info.bytesWritten = result.bytesWritten;
      info.tracks = result.tracks.length;
      info.reason = result.reason;

      if (result.bytesWritten > 0) {
        info.summary = await this.probe(result.audioFile, logger);
        if (info.summary) {
          const { container, codec, bitrate, duration } = info.summary;
          logger.info(
            `Recorded ${container ?? '?'}/${codec ?? '?'}, ${bitrate ? Math.round(bitrate / 1000) : '?'} kbps, ` +
              `${duration !== null ? duration.toFixed(1) : '?'} s`,
          );
        }
      }
    } catch (err) {
      info.status = 'failed';
      info.error = errorMessage(err);
      logger.error(`Session ${info.id} failed: ${info.error}`);
    } finally {
      info.finishedAt = this.now().toISOString();
      this.pruneFinished();
    }
    return info;
  }

  private pruneFinished(): void {
    const finished = [...this.sessions.values()].filter((s) => s.info.status !== 'running');
    for (const session of finished.slice(0, Math.max(0, finished.length - MAX_FINISHED_SESSIONS))) {
      this.sessions.delete(session.info.id);
    }
  }
}
