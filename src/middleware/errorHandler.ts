import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { RecorderError } from '../errors.js';
import type { Logger } from '../logger.js';

function statusCodeFor(error: RecorderError): number {
  switch (error.code) {
    case 'STREAM_NOT_FOUND':
    case 'SESSION_NOT_FOUND':
    case 'PROGRAM_NOT_FOUND':
      return 404;

    case 'INVALID_ARGUMENT':
    case 'INVALID_CONFIG':
      return 400;

    case 'INVALID_OPERATION':
      return 409;

    // 配信サーバーへの接続失敗
    case 'CONNECTION_ERROR':
      return 502;

    default:
      return 500;
  }
}

/**
 * ドメインエラーを HTTP ステータスに変換する
 */
export function createErrorHandler(logger: Logger) {
  return (error: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ZodError) {
      res.status(400).json({
        error: 'Invalid request',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    if (error instanceof RecorderError) {
      res.status(statusCodeFor(error)).json({ error: error.message, code: error.code });
      return;
    }

    logger.error(`${req.method} ${req.path} failed: ${error.message}`, error.stack);
    res.status(500).json({ error: 'Internal server error' });
  };
}
