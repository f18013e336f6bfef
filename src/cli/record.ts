#!/usr/bin/env node
/**
 * CLI: 設定したストリームを指定時刻まで並行して録音する
 *
 * Usage: icy-record --config config.json --duration 3600
 */
import path from 'node:path';
import { getRuntimeSettings, loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { RecordingManager } from '../recorder/RecordingManager.js';
import { USAGE, parseRecordArgs } from './args.js';

async function main(): Promise<void> {
  const args = parseRecordArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const logger = createLogger('icy-record', args.verbose ? 'debug' : undefined);
  const settings = getRuntimeSettings();
  const config = loadConfig(args.config ?? settings.configPath);
  const outputDir = path.resolve(args.output ?? settings.outputDir ?? config.recording.output);

  const manager = new RecordingManager(config, logger, { outputDir });
  const streamIds = args.streams.length > 0 ? args.streams : manager.getStreams().map((s) => s.id);
  if (streamIds.length === 0) {
    logger.warn('No streams configured');
    return;
  }

  logger.info('START');
  const request = {
    duration: args.duration ?? undefined,
    endTime: args.until ?? undefined,
    startMode: args.startMode ?? undefined,
    stopMode: args.stopMode ?? undefined,
  };
  const sessions = streamIds.map((id) => manager.start(id, request));
  logger.info(`Recording ${sessions.length} streams into '${outputDir}'`);

  process.once('SIGINT', () => {
    logger.warn('Interrupted!');
    manager.stopAll().catch((err) => logger.error('Stopping sessions failed:', err));
  });

  const results = await Promise.all(sessions.map((s) => manager.wait(s.id)));
  for (const result of results) {
    if (result.status === 'failed') {
      logger.error(`${result.streamName}: ${result.error}`);
    } else {
      logger.info(`${result.streamName}: ${result.audioFile ?? '(nothing recorded)'} [${result.reason}]`);
    }
  }
  logger.info('FINISHED');
  if (results.some((r) => r.status === 'failed')) process.exitCode = 1;
}

main().catch((err) => {
  console.error('[icy-record] Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
