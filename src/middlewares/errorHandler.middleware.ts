import type { NextFunction, Request, Response } from 'express';
import { AccessDeniedError, QuizError } from '../lib/errors';

// Body parser rejections carry their own 4xx status (413 for size and field count)
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

// Async route failures end up here (Express 5 forwards rejected promises)
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AccessDeniedError) {
    if (!res.headersSent) {
      res.status(403).json({ ok: false, reasonCode: err.reasonCode });
    }
    return;
  }
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    if (!res.headersSent) {
      const reasonCode = clientStatus === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST';
      res.status(clientStatus).json({ ok: false, reasonCode });
    }
    return;
  }
  console.error('[API error]', err);
  if (res.headersSent) return;
  const reasonCode = err instanceof QuizError ? err.reasonCode : 'INTERNAL_ERROR';
  res.status(500).json({ ok: false, reasonCode });
}
