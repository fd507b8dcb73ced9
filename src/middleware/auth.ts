import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'node:crypto';

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Bearer token or x-api-key check against a single configured admin key. */
export function adminKeyAuth(adminKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminKey) {
      res.status(404).json({ error: 'Not found' });
      return;
    }
    const header = req.headers['authorization'] || req.headers['x-api-key'];
    const key = (typeof header === 'string' ? header : header?.[0])?.replace(/^Bearer\s+/i, '').trim();
    if (!key || !sameKey(key, adminKey)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}
