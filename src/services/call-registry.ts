import type { LanguageCode } from '../config/languages';
import type { PipelineResult } from '../types';
import { SessionNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Clock, ConversationSession, DEFAULT_LIMITS, SessionLimits } from './session';

/** Phases a live call moves through. A call with no state has ended. */
export type CallPhase =
  | 'awaiting_first_input'
  | 'processing_turn'
  | 'awaiting_playback_ready'
  | 'playing_response_and_gathering'
  | 'awaiting_next_input';

export type TurnOutcome =
  | { status: 'running'; turn: number; startedAt: number }
  | { status: 'succeeded'; turn: number; result: PipelineResult; completedAt: number; recorded: boolean }
  | { status: 'failed'; turn: number; reason: string; completedAt: number };

/** Per-call state that lives alongside, but independently of, the session. */
export interface CallState {
  phase: CallPhase;
  language?: LanguageCode;
  pendingTranscription?: string;
  turnOutcome?: TurnOutcome;
  /** Number of turns launched so far; keys the audio artifacts. */
  turnsStarted: number;
  /** Consecutive prompts that got no usable input. */
  silentPrompts: number;
}

/**
 * Keyed store for everything the call flow remembers between webhooks. Every
 * operation is keyed by call SID, so distinct calls never touch the same entry.
 */
export class CallRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly calls = new Map<string, CallState>();

  constructor(
    private readonly limits: SessionLimits = DEFAULT_LIMITS,
    private readonly clock: Clock = Date.now,
  ) {}

  now(): number {
    return this.clock();
  }

  // Sessions

  createSession(callSid: string, language: LanguageCode, callerNumber = ''): ConversationSession {
    const session = new ConversationSession(callSid, language, callerNumber, this.limits, this.clock);
    this.sessions.set(callSid, session);
    logger.info('Created conversation session', { callSid, language });
    return session;
  }

  getSession(callSid: string): ConversationSession | undefined {
    return this.sessions.get(callSid);
  }

  requireSession(callSid: string): ConversationSession {
    const session = this.sessions.get(callSid);
    if (!session) throw new SessionNotFoundError(callSid);
    return session;
  }

  /** Removes the session and returns its summary, or null if there was none. */
  endSession(callSid: string): string | null {
    const session = this.sessions.get(callSid);
    if (!session) return null;
    this.sessions.delete(callSid);
    logger.info('Ended conversation session', { callSid, turns: session.turnCount });
    return session.getSummary();
  }

  listSessions(): ConversationSession[] {
    return [...this.sessions.values()];
  }

  // Call state

  openCall(callSid: string, language?: LanguageCode): CallState {
    const state: CallState = { phase: 'awaiting_first_input', language, turnsStarted: 0, silentPrompts: 0 };
    this.calls.set(callSid, state);
    return state;
  }

  getCall(callSid: string): CallState | undefined {
    return this.calls.get(callSid);
  }

  phaseOf(callSid: string): CallPhase | 'ended' {
    return this.calls.get(callSid)?.phase ?? 'ended';
  }

  setPhase(callSid: string, phase: CallPhase): void {
    const state = this.calls.get(callSid);
    if (state) state.phase = phase;
  }

  setLanguage(callSid: string, language: LanguageCode): void {
    const state = this.calls.get(callSid) ?? this.openCall(callSid);
    state.language = language;
  }

  getLanguage(callSid: string): LanguageCode | undefined {
    return this.calls.get(callSid)?.language;
  }

  setPendingTranscription(callSid: string, text: string): void {
    const state = this.calls.get(callSid) ?? this.openCall(callSid);
    state.pendingTranscription = text;
  }

  /** Returns the pending transcription and clears it. */
  takePendingTranscription(callSid: string): string | undefined {
    const state = this.calls.get(callSid);
    if (!state) return undefined;
    const text = state.pendingTranscription;
    state.pendingTranscription = undefined;
    return text;
  }

  /** Returns the number of the newly started turn. */
  beginTurn(callSid: string): number {
    const state = this.calls.get(callSid) ?? this.openCall(callSid);
    state.turnsStarted += 1;
    state.turnOutcome = { status: 'running', turn: state.turnsStarted, startedAt: this.clock() };
    return state.turnsStarted;
  }

  /** Records how a turn finished. Ignored for released calls and superseded turns. */
  settleTurn(callSid: string, outcome: Exclude<TurnOutcome, { status: 'running' }>): boolean {
    const state = this.calls.get(callSid);
    if (!state || state.turnOutcome?.turn !== outcome.turn) return false;
    state.turnOutcome = outcome;
    return true;
  }

  getTurnOutcome(callSid: string): TurnOutcome | undefined {
    return this.calls.get(callSid)?.turnOutcome;
  }

  /** Drops the session and all call state. Returns the session summary if any. */
  releaseCall(callSid: string): string | null {
    const summary = this.endSession(callSid);
    this.calls.delete(callSid);
    return summary;
  }

  activeCallCount(): number {
    return this.calls.size;
  }
}
