import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { CUT_MODES, type CutMode, type StreamDescriptor } from './types.js';

export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_RECORDINGS_DIR = './recordings';
export const DEFAULT_SCHEDULE_FILE = 'schedule.json';
export const DEFAULT_TIMEZONE = 'UTC';
export const DEFAULT_PORT = 3000;

/** 旧設定の "on-track" は defer-to-next-track として扱う */
export const cutModeSchema = z.union([
  z.enum(CUT_MODES),
  z.literal('on-track').transform((): CutMode => 'defer-to-next-track'),
]);

const channelSchema = z.object({
  id: z.number().int(),
  name: z.string().trim().min(1),
});

const recordingSchema = z.object({
  output: z.string().min(1).default(DEFAULT_RECORDINGS_DIR),
  cuesheet: z.boolean().default(false),
  tracklist: z.boolean().default(true),
  chapters: z.boolean().default(true),
  startMode: cutModeSchema.default('immediate'),
  stopMode: cutModeSchema.default('immediate'),
  timezone: z.string().min(1).default(DEFAULT_TIMEZONE),
});

const streamSchema = z.object({
  id: z.string().trim().min(1),
  channel: z.number().int(),
  url: z.string().url(),
  type: z.string().trim().default(''),
  cuesheet: z.boolean().optional(),
  tracklist: z.boolean().optional(),
});

export const appConfigSchema = z.object({
  channels: z.array(channelSchema).default([]),
  recording: recordingSchema.default({}),
  streams: z.array(streamSchema).default([]),
});

export type ChannelConfig = z.infer<typeof channelSchema>;
export type RecordingConfig = z.infer<typeof recordingSchema>;
export type StreamConfig = z.infer<typeof streamSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export function parseConfig(data: unknown): AppConfig {
  const result = appConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const ids = new Set<string>();
  for (const stream of result.data.streams) {
    if (ids.has(stream.id)) {
      throw new ConfigError(`Duplicate stream id: ${stream.id}`);
    }
    ids.add(stream.id);
  }
  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file '${configPath}': ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file '${configPath}' is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfig(data);
}

/**
 * ストリームごとの cuesheet/tracklist はチャンネル名とあわせて解決する。
 * 未指定なら recording の既定値を使う。
 */
export function resolveStreams(config: AppConfig): StreamDescriptor[] {
  const channels = new Map(config.channels.map((c) => [c.id, c]));

  return config.streams.map((stream) => {
    const channel = channels.get(stream.channel);
    if (!channel) {
      throw new ConfigError(`Definition for channel #${stream.channel} missing (stream '${stream.id}')`);
    }
    return {
      id: stream.id,
      name: channel.name,
      url: stream.url,
      type: stream.type,
      cuesheet: stream.cuesheet ?? config.recording.cuesheet,
      tracklist: stream.tracklist ?? config.recording.tracklist,
    };
  });
}

export interface RuntimeSettings {
  configPath: string;
  outputDir: string | null;
  schedulePath: string;
  port: number;
  apiKey: string;
}

/** 環境変数で上書きできる実行時設定 */
export function getRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  return {
    configPath: env.CONFIG_PATH || DEFAULT_CONFIG_FILE,
    outputDir: env.RECORDINGS_DIR || null,
    schedulePath: env.SCHEDULE_PATH || path.join(process.cwd(), DEFAULT_SCHEDULE_FILE),
    port: Number(env.PORT) || DEFAULT_PORT,
    apiKey: env.API_KEY || '',
  };
}
