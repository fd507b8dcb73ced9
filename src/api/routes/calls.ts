import { Router } from 'express';
import { z } from 'zod';
import { CallRegistry } from '../../services/call-registry';
import { ConversationSession } from '../../services/session';
import type { CallHangup } from '../../services/twilio';
import { errorFields, logger } from '../../utils/logger';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

function describeSession(registry: CallRegistry, session: ConversationSession) {
  return {
    callSid: session.callSid,
    callerNumber: session.callerNumber,
    language: registry.getLanguage(session.callSid) ?? session.language,
    phase: registry.phaseOf(session.callSid),
    startedAt: session.startedAt.toISOString(),
    elapsedSeconds: session.elapsedSeconds,
    turns: session.turnCount,
  };
}

/** Read-only view of live calls plus a hangup action. Mounted behind the admin key. */
export function createCallsRouter(registry: CallRegistry, telephony: CallHangup): Router {
  const router = Router();

  // GET /api/calls — live sessions, oldest first
  router.get('/', (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation error', details: parsed.error.issues });
      return;
    }
    const { limit, offset } = parsed.data;
    const sessions = registry.listSessions();
    res.json({
      total: sessions.length,
      calls: sessions.slice(offset, offset + limit).map((s) => describeSession(registry, s)),
    });
  });

  // GET /api/calls/:callSid — one live session with its turns
  router.get('/:callSid', (req, res) => {
    const session = registry.getSession(req.params.callSid);
    if (!session) {
      res.status(404).json({ error: 'Call not found' });
      return;
    }
    res.json({
      ...describeSession(registry, session),
      history: session.turns.map((t) => ({
        question: t.question,
        answer: t.answer,
        timestamp: t.timestamp.toISOString(),
      })),
      summary: session.getSummary(),
    });
  });

  // POST /api/calls/:callSid/hangup — end a live call from outside
  router.post('/:callSid/hangup', async (req, res) => {
    const { callSid } = req.params;
    if (registry.phaseOf(callSid) === 'ended') {
      res.status(404).json({ error: 'Call not found' });
      return;
    }
    try {
      await telephony.hangupCall(callSid);
      res.json({ ok: true });
    } catch (err) {
      logger.error('Error hanging up call', { callSid, ...errorFields(err) });
      res.status(502).json({ error: 'Hangup failed' });
    }
  });

  return router;
}
