import { Request, Response, NextFunction, RequestHandler } from 'express';
import { validateRequest } from 'twilio';
import { logger } from '../utils/logger';

export interface TwilioAuthOptions {
  authToken: string;
  publicUrl: string;
  /** When false every request passes; for local tunnels whose URL differs from PUBLIC_URL. */
  enabled: boolean;
}

export function twilioWebhookAuth(options: TwilioAuthOptions): RequestHandler {
  const base = options.publicUrl.replace(/\/+$/, '');

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.enabled) {
      next();
      return;
    }

    const header = req.headers['x-twilio-signature'];
    const signature = typeof header === 'string' ? header : '';
    const url = `${base}${req.originalUrl}`;

    const valid = validateRequest(options.authToken, signature, url, req.body ?? {});

    if (!valid) {
      logger.warn('Rejected webhook with invalid signature', { path: req.path });
      res.status(403).send('Forbidden');
      return;
    }

    next();
  };
}
