import { Router, type RequestHandler } from 'express';
import type { ScheduleManager } from '../schedule/ScheduleManager.js';
import { programInputSchema } from '../schedule/ScheduleManager.js';

export function createScheduleRoutes(scheduleManager: ScheduleManager, auth: RequestHandler): Router {
  const router = Router();

  /**
   * GET /schedule - 予約一覧 (次回実行時刻付き)
   */
  router.get('/schedule', (_req, res) => {
    res.json({ programs: scheduleManager.getProgramsWithNextRun() });
  });

  /**
   * POST /schedule/programs - 予約追加
   * Body: { name, cron, streams: [streamId], duration, startMode?, stopMode?, enabled? }
   */
  router.post('/schedule/programs', auth, (req, res) => {
    const program = scheduleManager.addProgram(programInputSchema.parse(req.body ?? {}));
    res.status(201).json({ ok: true, program });
  });

  /**
   * PUT /schedule/programs/:id - 予約更新 (指定したフィールドのみ)
   */
  router.put('/schedule/programs/:id', auth, (req, res) => {
    const input = programInputSchema.partial().parse(req.body ?? {});
    const program = scheduleManager.updateProgram(req.params.id, input);
    res.json({ ok: true, program });
  });

  router.delete('/schedule/programs/:id', auth, (req, res) => {
    scheduleManager.deleteProgram(req.params.id);
    res.json({ ok: true });
  });

  return router;
}
