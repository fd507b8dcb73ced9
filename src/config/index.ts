import dotenv from 'dotenv';
dotenv.config();

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function intFrom(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseInt(raw, 10);
  if (Number.isNaN(val) || val <= 0) throw new Error(`Env var ${key} must be a positive integer, got: ${raw}`);
  return val;
}

function flag(key: string, fallback: boolean): boolean {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  publicUrl: required('PUBLIC_URL'),
  twilio: {
    accountSid: required('TWILIO_ACCOUNT_SID'),
    authToken: required('TWILIO_AUTH_TOKEN'),
    phoneNumber: process.env.TWILIO_PHONE_NUMBER || '',
    validateSignature: flag('TWILIO_VALIDATE_SIGNATURE', true),
  },
  deepgram: {
    apiKey: required('DEEPGRAM_API_KEY'),
  },
  sarvam: {
    apiKey: required('SARVAM_API_KEY'),
  },
  llm: {
    apiKey: required('GROQ_API_KEY'),
    baseUrl: process.env.LLM_BASE_URL || 'https://api.groq.com/openai/v1',
    model: process.env.LLM_MODEL || 'llama-3.3-70b-versatile',
  },
  googleTts: {
    apiKey: required('GOOGLE_TTS_API_KEY'),
  },
  admin: {
    apiKey: process.env.ADMIN_API_KEY || '',
  },
  helpline: {
    qualityGateEnabled: flag('QUALITY_GATE_ENABLED', false),
    maxTurns: intFrom('HELPLINE_MAX_TURNS', 10),
    maxDurationSec: intFrom('HELPLINE_MAX_DURATION_SEC', 600),
    pollIntervalSec: intFrom('HELPLINE_POLL_INTERVAL_SEC', 3),
    maxTurnWaitSec: intFrom('HELPLINE_MAX_TURN_WAIT_SEC', 90),
  },
};
