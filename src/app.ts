import express, { Express, RequestHandler } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createCallsRouter } from './api/routes/calls';
import { createTwilioRouter } from './api/routes/twilio';
import { adminKeyAuth } from './middleware/auth';
import { CallController } from './services/call-controller';
import { CallRegistry } from './services/call-registry';
import type { CallHangup } from './services/twilio';

export interface AppDeps {
  controller: CallController;
  registry: CallRegistry;
  telephony: CallHangup;
  webhookAuth: RequestHandler;
  /** Empty disables the admin routes. */
  adminApiKey: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  const adminLimiter = rateLimit({ windowMs: 60_000, limit: 30, standardHeaders: true, legacyHeaders: false });

  app.use('/api/calls', adminLimiter, adminKeyAuth(deps.adminApiKey), createCallsRouter(deps.registry, deps.telephony));
  app.use('/twilio', createTwilioRouter(deps.controller, deps.webhookAuth));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), activeCalls: deps.registry.activeCallCount() });
  });

  return app;
}
