import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { cutModeSchema } from '../config.js';
import type { RecordingManager } from '../recorder/RecordingManager.js';
import { parseDateTimeArg } from '../utils/datetime.js';

const startRecordingSchema = z.object({
  streamId: z.string().trim().min(1),
  /** 秒 */
  duration: z.number().positive().optional(),
  /** `[YYYY-MM-DD] HH:MM[:SS]` */
  until: z.string().trim().min(1).optional(),
  startMode: cutModeSchema.optional(),
  stopMode: cutModeSchema.optional(),
});

export function createRecordingRoutes(recordingManager: RecordingManager, auth: RequestHandler): Router {
  const router = Router();

  /**
   * GET /recordings - セッション一覧 (実行中 + 直近の終了分)
   */
  router.get('/recordings', (_req, res) => {
    res.json({ sessions: recordingManager.list() });
  });

  router.get('/recordings/:id', (req, res) => {
    res.json(recordingManager.get(req.params.id));
  });

  /**
   * POST /recordings - 録音開始
   * Body: { streamId, duration? | until?, startMode?, stopMode? }
   */
  router.post('/recordings', auth, (req, res) => {
    const { streamId, duration, until, startMode, stopMode } = startRecordingSchema.parse(req.body ?? {});
    const session = recordingManager.start(streamId, {
      duration,
      endTime: until ? parseDateTimeArg(until) : undefined,
      startMode,
      stopMode,
    });
    res.status(201).json(session);
  });

  /**
   * POST /recordings/:id/stop - 録音停止 (後始末は非同期に行われる)
   */
  router.post('/recordings/:id/stop', auth, (req, res) => {
    res.json(recordingManager.stop(req.params.id));
  });

  return router;
}
