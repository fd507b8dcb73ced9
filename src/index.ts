import { config } from './config';
import { createApp } from './app';
import { twilioWebhookAuth } from './middleware/twilioAuth';
import { CallController } from './services/call-controller';
import { CallRegistry } from './services/call-registry';
import { DeepgramSpeechToText } from './services/deepgram';
import { GoogleTextToSpeech } from './services/google-tts';
import { ChatAnswerGenerator } from './services/llm';
import { QualityGate } from './services/quality-gate';
import { SarvamTranslator } from './services/sarvam';
import { TurnProcessor } from './services/turn-processor';
import { createCallHangup, TwilioRecordingSource } from './services/twilio';
import { errorFields, logger } from './utils/logger';

const registry = new CallRegistry({
  maxTurns: config.helpline.maxTurns,
  maxDurationSec: config.helpline.maxDurationSec,
});

const processor = new TurnProcessor({
  recordings: new TwilioRecordingSource(config.twilio),
  stt: new DeepgramSpeechToText(config.deepgram.apiKey),
  translator: new SarvamTranslator(config.sarvam.apiKey),
  llm: new ChatAnswerGenerator({ apiKey: config.llm.apiKey, baseURL: config.llm.baseUrl, model: config.llm.model }),
  tts: new GoogleTextToSpeech(config.googleTts.apiKey),
  qualityGate: new QualityGate({ enabled: config.helpline.qualityGateEnabled }),
});

const controller = new CallController({
  registry,
  processor,
  publicUrl: config.publicUrl,
  policy: {
    pollIntervalSec: config.helpline.pollIntervalSec,
    maxTurnWaitSec: config.helpline.maxTurnWaitSec,
  },
});

const app = createApp({
  controller,
  registry,
  telephony: createCallHangup(config.twilio),
  webhookAuth: twilioWebhookAuth({
    authToken: config.twilio.authToken,
    publicUrl: config.publicUrl,
    enabled: config.twilio.validateSignature,
  }),
  adminApiKey: config.admin.apiKey,
});

function start() {
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, {
      publicUrl: config.publicUrl,
      phoneNumber: config.twilio.phoneNumber || undefined,
      qualityGate: config.helpline.qualityGateEnabled,
      adminApi: Boolean(config.admin.apiKey),
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal, activeCalls: registry.activeCallCount() });
    server.close();
    controller
      .drain()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('Error draining turns', errorFields(err));
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (err) {
  logger.error('Failed to start server', errorFields(err));
  process.exit(1);
}
