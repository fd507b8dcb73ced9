import Twilio from 'twilio';
import type { RecordingSource } from '../types';
import { DEFAULT_TIMEOUT_MS, ensureOk } from '../utils/http';
import { logger } from '../utils/logger';

export interface TwilioCredentials {
  accountSid: string;
  authToken: string;
}

/** Fetches call recordings as WAV using account credentials. */
export class TwilioRecordingSource implements RecordingSource {
  constructor(private readonly credentials: TwilioCredentials) {}

  async download(recordingUrl: string): Promise<Buffer> {
    const auth = Buffer.from(`${this.credentials.accountSid}:${this.credentials.authToken}`).toString('base64');
    const res = await fetch(`${recordingUrl}.wav`, {
      headers: { Authorization: `Basic ${auth}` },
      signal: AbortSignal.timeout(DEFAULT_TIMEOUT_MS),
    });
    await ensureOk('recording', res);
    return Buffer.from(await res.arrayBuffer());
  }
}

export interface CallHangup {
  hangupCall(callSid: string): Promise<void>;
}

export function createCallHangup(credentials: TwilioCredentials): CallHangup {
  const client = Twilio(credentials.accountSid, credentials.authToken);
  return {
    async hangupCall(callSid: string): Promise<void> {
      await client.calls(callSid).update({ status: 'completed' });
      logger.info('Call hung up', { callSid });
    },
  };
}
