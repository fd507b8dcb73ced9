import { Router, Request, Response, RequestHandler } from 'express';
import { z } from 'zod';
import { CallController } from '../../services/call-controller';
import { renderTwiml } from '../../services/twiml';
import type { VoiceScript } from '../../types';
import { errorFields, logger } from '../../utils/logger';

const callSid = z.string().min(1);

const voiceSchema = z.object({ CallSid: callSid, From: z.string().optional() });
const recordingSchema = z.object({ CallSid: callSid, RecordingUrl: z.string().url().optional() });
const pollSchema = z.object({ CallSid: callSid });
const gatherSchema = z.object({
  CallSid: callSid,
  SpeechResult: z.string().optional(),
  Digits: z.string().optional(),
});
const statusSchema = z.object({ CallSid: callSid, CallStatus: z.string().min(1) });
const audioParamsSchema = z.object({ callSid, turn: z.coerce.number().int().positive() });

function sendScript(res: Response, script: VoiceScript): void {
  res.type('text/xml');
  res.send(renderTwiml(script));
}

function handleError(res: Response, err: unknown, message: string): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation error', details: err.issues });
    return;
  }
  logger.error(message, errorFields(err));
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Carrier webhooks. Every POST answers with TwiML; the audio route serves the
 * synthesized answer for a turn.
 */
export function createTwilioRouter(controller: CallController, webhookAuth: RequestHandler): Router {
  const router = Router();

  // POST /twilio/voice — call answered
  router.post('/voice', webhookAuth, (req: Request, res: Response) => {
    try {
      const body = voiceSchema.parse(req.body);
      sendScript(res, controller.handleIncomingCall({ callSid: body.CallSid, from: body.From }));
    } catch (err) {
      handleError(res, err, 'Error handling voice webhook');
    }
  });

  // POST /twilio/recording — caller finished recording a question
  router.post('/recording', webhookAuth, (req: Request, res: Response) => {
    try {
      const body = recordingSchema.parse(req.body);
      sendScript(res, controller.handleRecording({ callSid: body.CallSid, recordingUrl: body.RecordingUrl }));
    } catch (err) {
      handleError(res, err, 'Error handling recording webhook');
    }
  });

  // POST /twilio/poll — redirect loop while a turn is processing
  router.post('/poll', webhookAuth, (req: Request, res: Response) => {
    try {
      const body = pollSchema.parse(req.body);
      sendScript(res, controller.handlePoll({ callSid: body.CallSid }));
    } catch (err) {
      handleError(res, err, 'Error handling poll webhook');
    }
  });

  // POST /twilio/gather — speech or keypad input after an answer
  router.post('/gather', webhookAuth, (req: Request, res: Response) => {
    try {
      const body = gatherSchema.parse(req.body);
      sendScript(
        res,
        controller.handleGather({ callSid: body.CallSid, speech: body.SpeechResult, digits: body.Digits }),
      );
    } catch (err) {
      handleError(res, err, 'Error handling gather webhook');
    }
  });

  // POST /twilio/status — status callback
  router.post('/status', webhookAuth, (req: Request, res: Response) => {
    try {
      const body = statusSchema.parse(req.body);
      logger.info('Twilio status callback', { callSid: body.CallSid, callStatus: body.CallStatus });
      controller.handleStatus({ callSid: body.CallSid, callStatus: body.CallStatus });
      res.sendStatus(200);
    } catch (err) {
      handleError(res, err, 'Error handling status callback');
    }
  });

  // GET /twilio/audio/:callSid/:turn — fetched by the carrier's <Play>
  router.get('/audio/:callSid/:turn', (req: Request, res: Response) => {
    const parsed = audioParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation error', details: parsed.error.issues });
      return;
    }
    const audio = controller.getAudio(parsed.data.callSid, parsed.data.turn);
    if (!audio) {
      res.status(404).json({ error: 'Audio not found' });
      return;
    }
    res.type('audio/mpeg');
    res.send(audio);
  });

  return router;
}
