import type { NextFunction, Request, Response } from 'express';
import { matchesAdminKey } from '../lib/adminKey';

export function readAdminKey(req: Request): string {
  return typeof req.query.key === 'string' ? req.query.key : '';
}

export function requireAdminKey(adminKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!matchesAdminKey(readAdminKey(req), adminKey)) {
      res.status(403).json({ ok: false, reasonCode: 'ACCESS_DENIED' });
      return;
    }
    next();
  };
}
