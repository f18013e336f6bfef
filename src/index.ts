import path from 'node:path';
import { createApp } from './app.js';
import { getRuntimeSettings, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { RecordingManager } from './recorder/RecordingManager.js';
import { ScheduleManager } from './schedule/ScheduleManager.js';

async function main() {
  const logger = createLogger('icy-recorder');
  const settings = getRuntimeSettings();
  const config = loadConfig(settings.configPath);
  const outputDir = path.resolve(settings.outputDir ?? config.recording.output);

  const recordingManager = new RecordingManager(config, logger.child('RecordingManager'), { outputDir });
  const scheduleManager = new ScheduleManager(
    settings.schedulePath,
    recordingManager,
    logger.child('ScheduleManager'),
    config.recording.timezone,
  );
  scheduleManager.load();

  const app = createApp({ recordingManager, scheduleManager, apiKey: settings.apiKey, logger });
  const server = app.listen(settings.port, () => {
    logger.info(`Server running on http://localhost:${settings.port}`);
    logger.info(`Status:     http://localhost:${settings.port}/status`);
    logger.info(`${recordingManager.getStreams().length} streams configured, recording into ${outputDir}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, stopping recordings`);
    scheduleManager.stopAll();
    server.close();
    recordingManager
      .stopAll()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('[icy-recorder] Fatal error:', err);
  process.exit(1);
});
