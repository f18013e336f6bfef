import express from 'express';
import type { Logger } from './logger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { requireApiKey } from './middleware/auth.js';
import type { RecordingManager } from './recorder/RecordingManager.js';
import { createRecordingRoutes } from './routes/recordings.routes.js';
import { createScheduleRoutes } from './routes/schedule.routes.js';
import { createStatusRoutes } from './routes/status.routes.js';
import type { ScheduleManager } from './schedule/ScheduleManager.js';

export interface AppDependencies {
  recordingManager: RecordingManager;
  scheduleManager: ScheduleManager;
  apiKey: string;
  logger: Logger;
}

export function createApp({ recordingManager, scheduleManager, apiKey, logger }: AppDependencies): express.Express {
  const app = express();
  const auth = requireApiKey(apiKey);

  app.use(express.json());
  app.use(createStatusRoutes(recordingManager, scheduleManager));
  app.use(createRecordingRoutes(recordingManager, auth));
  app.use(createScheduleRoutes(scheduleManager, auth));
  app.use(createErrorHandler(logger));

  return app;
}
