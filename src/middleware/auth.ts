import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * `Authorization: Bearer <API_KEY>` を要求するミドルウェア
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      // API_KEY 未設定の場合はすべて許可（開発用）
      next();
      return;
    }

    const auth = req.headers.authorization;
    if (auth === `Bearer ${apiKey}`) {
      next();
      return;
    }

    res.status(401).json({ error: 'Unauthorized' });
  };
}
