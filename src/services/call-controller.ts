import { AUTO, COMMON_LANGUAGE, DEFAULT_LANGUAGE, LanguageCode, languageProfile } from '../config/languages';
import { prompt, PromptKey } from '../prompts';
import type { GatherAction, PipelineResult, RecordAction, SpeakAction, VoiceScript } from '../types';
import { callLogger, errorFields } from '../utils/logger';
import { languageHintForPhone } from '../utils/phone';
import { CallRegistry, CallState } from './call-registry';
import { exitKeywords, isExitIntent } from './exit-intent';
import { TurnProcessor, TurnRequest } from './turn-processor';

export interface CallPolicy {
  recordMaxLengthSec: number;
  recordSilenceTimeoutSec: number;
  gatherTimeoutSec: number;
  pollIntervalSec: number;
  /** How long a caller may wait on one turn before the call is ended. */
  maxTurnWaitSec: number;
  /** Re-prompts allowed after input that was empty or unusable. */
  maxSilentPrompts: number;
}

export const DEFAULT_POLICY: CallPolicy = {
  recordMaxLengthSec: 30,
  recordSilenceTimeoutSec: 3,
  gatherTimeoutSec: 5,
  pollIntervalSec: 3,
  maxTurnWaitSec: 90,
  maxSilentPrompts: 1,
};

export interface CallControllerOptions {
  registry: CallRegistry;
  processor: TurnProcessor;
  /** Externally reachable base URL that carrier callbacks are built on. */
  publicUrl: string;
  policy?: Partial<CallPolicy>;
}

type EndKey = Extract<PromptKey, 'goodbye' | 'limitReached' | 'error'>;

const TERMINAL_STATUSES = new Set(['completed', 'busy', 'failed', 'no-answer', 'canceled']);

/**
 * Drives the carrier-facing call flow. Each handler answers one webhook with
 * the voice script the carrier should run next.
 *
 * greeting → record → (turn runs in background, caller polls) → play + gather
 * → exit, or loop to the next turn.
 */
export class CallController {
  private readonly registry: CallRegistry;
  private readonly processor: TurnProcessor;
  private readonly policy: CallPolicy;
  private readonly baseUrl: string;
  private readonly inflight = new Map<string, Promise<void>>();

  constructor(options: CallControllerOptions) {
    this.registry = options.registry;
    this.processor = options.processor;
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.baseUrl = options.publicUrl.replace(/\/+$/, '');
  }

  handleIncomingCall(params: { callSid: string; from?: string }): VoiceScript {
    const { callSid } = params;
    const log = callLogger(callSid);

    const existing = this.registry.getCall(callSid);
    if (existing) {
      log.warn('Duplicate call-start webhook, repeating greeting');
      return this.greetingScript(existing.language ?? DEFAULT_LANGUAGE);
    }

    const hint = languageHintForPhone(params.from);
    this.registry.openCall(callSid, hint);
    this.registry.createSession(callSid, hint, params.from ?? '');
    log.info('Incoming call', { from: params.from, languageHint: hint });

    return this.greetingScript(hint);
  }

  handleRecording(params: { callSid: string; recordingUrl?: string }): VoiceScript {
    const { callSid } = params;
    const state = this.registry.getCall(callSid);
    if (!state) return this.endedScript(callSid);

    if (state.phase === 'awaiting_playback_ready' || state.phase === 'processing_turn') {
      callLogger(callSid).warn('Recording arrived while a turn is in progress; continuing to poll');
      return this.holdScript(this.languageOf(state));
    }

    if (!params.recordingUrl) {
      callLogger(callSid).warn('Recording webhook without a recording URL');
      return [this.say(this.languageOf(state), 'repeat'), this.record()];
    }

    return this.startTurn(callSid, state, { recordingUrl: params.recordingUrl });
  }

  /** Readiness check. Does not touch the call while its turn is still running. */
  handlePoll(params: { callSid: string }): VoiceScript {
    const { callSid } = params;
    const state = this.registry.getCall(callSid);
    if (!state) return this.endedScript(callSid);

    const outcome = state.turnOutcome;
    const language = this.languageOf(state);
    if (!outcome) {
      return [this.say(language, 'recordNext'), this.record()];
    }

    switch (outcome.status) {
      case 'running': {
        const waitedMs = this.registry.now() - outcome.startedAt;
        if (waitedMs > this.policy.maxTurnWaitSec * 1000) {
          callLogger(callSid).error('Turn exceeded maximum wait, ending call', {
            turn: outcome.turn,
            waitedMs,
          });
          return this.endCall(callSid, 'error');
        }
        return this.stillProcessingScript(language);
      }
      case 'failed':
        callLogger(callSid).warn('Turn failed, ending call', { turn: outcome.turn, reason: outcome.reason });
        return this.endCall(callSid, 'error');
      case 'succeeded':
        return this.responseScript(callSid, state, outcome.turn, outcome.result);
    }
  }

  handleGather(params: { callSid: string; speech?: string; digits?: string }): VoiceScript {
    const { callSid } = params;
    const log = callLogger(callSid);
    const state = this.registry.getCall(callSid);
    const session = this.registry.getSession(callSid);
    if (!state || !session) return this.endedScript(callSid);

    const outcome = state.turnOutcome;
    if (outcome?.status === 'succeeded' && outcome.result.valid && !outcome.recorded) {
      session.addTurn(outcome.result.translatedQuery ?? outcome.result.transcribedText, outcome.result.llmResponseEn);
      outcome.recorded = true;
    }

    const language = this.languageOf(state);
    if (isExitIntent(params, language)) {
      log.info('Caller asked to end the call', { speech: params.speech, digits: params.digits });
      return this.endCall(callSid, 'goodbye');
    }
    if (session.shouldEnd()) {
      return this.endCall(callSid, 'limitReached');
    }

    const speech = params.speech?.trim() ?? '';
    if (!speech && !params.digits) {
      state.silentPrompts += 1;
      if (state.silentPrompts > this.policy.maxSilentPrompts) {
        log.info('No input after re-prompt, ending call');
        return this.endCall(callSid, 'goodbye');
      }
      return [this.gather(language, [this.say(language, 'areYouThere')])];
    }
    state.silentPrompts = 0;

    if (speech && languageProfile(language).speechCapture) {
      this.registry.setPendingTranscription(callSid, speech);
      return this.startTurn(callSid, state, {});
    }

    this.registry.setPhase(callSid, 'awaiting_next_input');
    return [this.say(language, 'recordNext'), this.record()];
  }

  /** Carrier status callback. Terminal statuses release everything held for the call. */
  handleStatus(params: { callSid: string; callStatus: string }): void {
    const { callSid, callStatus } = params;
    if (!TERMINAL_STATUSES.has(callStatus)) return;
    if (this.registry.phaseOf(callSid) === 'ended' && !this.registry.getSession(callSid)) return;

    const summary = this.registry.releaseCall(callSid);
    callLogger(callSid).info('Call finished', { callStatus, summary });
  }

  /** Synthesized answer for the given turn, if it is the call's current one. */
  getAudio(callSid: string, turn: number): Buffer | null {
    const outcome = this.registry.getTurnOutcome(callSid);
    if (outcome?.status !== 'succeeded' || outcome.turn !== turn) return null;
    return outcome.result.outputAudio;
  }

  /** Resolves once every background turn has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight.values()]);
    }
  }

  private startTurn(callSid: string, state: CallState, input: { recordingUrl?: string }): VoiceScript {
    const session = this.registry.getSession(callSid);
    if (!session) return this.endedScript(callSid);

    // Language problems are caller input errors: reject before any work starts.
    this.processor.validateLanguages(AUTO, COMMON_LANGUAGE);

    this.registry.setPhase(callSid, 'processing_turn');
    const turn = this.registry.beginTurn(callSid);
    const externalTranscription = this.registry.takePendingTranscription(callSid);
    const request: TurnRequest = {
      callSid,
      recordingUrl: input.recordingUrl,
      sourceLang: AUTO,
      targetLang: COMMON_LANGUAGE,
      phoneHint: session.language,
      history: session.history(),
      externalTranscription,
      // Gathered speech was recognised in the call's current language.
      externalLanguage: externalTranscription === undefined ? undefined : this.languageOf(state),
    };

    const key = `${callSid}:${turn}`;
    const task = this.runTurn(callSid, turn, request)
      .catch((err) => {
        callLogger(callSid).error('Unexpected error settling turn', { turn, ...errorFields(err) });
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, task);

    this.registry.setPhase(callSid, 'awaiting_playback_ready');
    return this.holdScript(this.languageOf(state));
  }

  private async runTurn(callSid: string, turn: number, request: TurnRequest): Promise<void> {
    const log = callLogger(callSid);
    try {
      const result = await this.processor.processTurn(request);
      const stored = this.registry.settleTurn(callSid, {
        status: 'succeeded',
        turn,
        result,
        completedAt: this.registry.now(),
        recorded: false,
      });
      const state = stored ? this.registry.getCall(callSid) : undefined;
      if (state) {
        // Counted here so that re-delivered polls of the same outcome change nothing.
        if (result.valid) {
          state.silentPrompts = 0;
          this.registry.setLanguage(callSid, result.inputLanguage);
        } else {
          state.silentPrompts += 1;
        }
      }
      log.info('Turn completed', { turn, valid: result.valid, language: result.inputLanguage, stored });
    } catch (err) {
      log.error('Turn processing failed', { turn, ...errorFields(err) });
      this.registry.settleTurn(callSid, {
        status: 'failed',
        turn,
        reason: err instanceof Error ? err.message : String(err),
        completedAt: this.registry.now(),
      });
    }
  }

  private responseScript(callSid: string, state: CallState, turn: number, result: PipelineResult): VoiceScript {
    const language = this.languageOf(state);
    const play = { kind: 'play' as const, url: this.audioUrl(callSid, turn) };

    if (!result.valid) {
      // The caller is asked to repeat; nothing from this exchange joins the conversation.
      if (state.silentPrompts > this.policy.maxSilentPrompts) {
        return this.endCall(callSid, 'goodbye');
      }
      this.registry.setPhase(callSid, 'awaiting_next_input');
      return [play, this.record()];
    }

    this.registry.setPhase(callSid, 'playing_response_and_gathering');
    return [this.gather(language, [play, this.say(language, 'askNext')])];
  }

  private endCall(callSid: string, key: EndKey): VoiceScript {
    const language = this.registry.getLanguage(callSid) ?? this.registry.getSession(callSid)?.language ?? DEFAULT_LANGUAGE;
    const summary = this.registry.releaseCall(callSid);
    callLogger(callSid).info('Call ended', { reason: key, summary });
    return [this.say(language, key), { kind: 'hangup' }];
  }

  private endedScript(callSid: string): VoiceScript {
    callLogger(callSid).warn('Webhook for a call with no live state');
    return [this.say(DEFAULT_LANGUAGE, 'goodbye'), { kind: 'hangup' }];
  }

  private languageOf(state: CallState): LanguageCode {
    return state.language ?? DEFAULT_LANGUAGE;
  }

  private greetingScript(language: LanguageCode): VoiceScript {
    return [this.say(language, 'greeting'), this.record()];
  }

  private holdScript(language: LanguageCode): VoiceScript {
    return [
      this.say(language, 'hold'),
      { kind: 'pause', lengthSec: this.policy.pollIntervalSec },
      { kind: 'redirect', url: this.url('/twilio/poll') },
    ];
  }

  private stillProcessingScript(language: LanguageCode): VoiceScript {
    return [
      this.say(language, 'stillProcessing'),
      { kind: 'pause', lengthSec: this.policy.pollIntervalSec },
      { kind: 'redirect', url: this.url('/twilio/poll') },
    ];
  }

  private say(language: LanguageCode, key: PromptKey): SpeakAction {
    return { kind: 'say', text: prompt(language, key), language };
  }

  private record(): RecordAction {
    return {
      kind: 'record',
      maxLengthSec: this.policy.recordMaxLengthSec,
      silenceTimeoutSec: this.policy.recordSilenceTimeoutSec,
      action: this.url('/twilio/recording'),
    };
  }

  private gather(language: LanguageCode, prompts: GatherAction['prompts']): GatherAction {
    return {
      kind: 'gather',
      input: ['speech', 'dtmf'],
      timeoutSec: this.policy.gatherTimeoutSec,
      action: this.url('/twilio/gather'),
      language,
      hints: [...exitKeywords(language), ...(language === COMMON_LANGUAGE ? [] : exitKeywords(COMMON_LANGUAGE))],
      bargeIn: true,
      prompts,
    };
  }

  private audioUrl(callSid: string, turn: number): string {
    return this.url(`/twilio/audio/${encodeURIComponent(callSid)}/${turn}`);
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }
}
