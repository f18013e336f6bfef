import { Router } from 'express';
import type { RecordingManager } from '../recorder/RecordingManager.js';
import type { ScheduleManager } from '../schedule/ScheduleManager.js';
import { VERSION } from '../version.js';

export function createStatusRoutes(recordingManager: RecordingManager, scheduleManager?: ScheduleManager): Router {
  const router = Router();

  /**
   * GET /status - 現在の録音状態
   */
  router.get('/status', (_req, res) => {
    res.json({
      version: VERSION,
      streams: recordingManager.getStreams().length,
      activeSessions: recordingManager.getActiveCount(),
      programs: scheduleManager ? scheduleManager.getPrograms().length : 0,
    });
  });

  /**
   * GET /streams - 設定済みストリーム
   */
  router.get('/streams', (_req, res) => {
    res.json({ streams: recordingManager.getStreams() });
  });

  return router;
}
