import type { LanguageCode } from '../config/languages';
import type { ConversationTurn, HistoryEntry } from '../types';
import { callLogger, Logger } from '../utils/logger';

export interface SessionLimits {
  maxTurns: number;
  maxDurationSec: number;
}

export const DEFAULT_LIMITS: SessionLimits = { maxTurns: 10, maxDurationSec: 600 };

export type Clock = () => number;

export type SessionEndReason = 'max_turns' | 'max_duration';

/**
 * Live record of one call's turns and timing. Turns are append-only and kept
 * in conversation order.
 */
export class ConversationSession {
  readonly startedAt: Date;
  private readonly _turns: ConversationTurn[] = [];
  private readonly log: Logger;

  constructor(
    readonly callSid: string,
    readonly language: LanguageCode,
    readonly callerNumber: string = '',
    private readonly limits: SessionLimits = DEFAULT_LIMITS,
    private readonly clock: Clock = Date.now,
  ) {
    this.startedAt = new Date(clock());
    this.log = callLogger(callSid);
  }

  get turns(): readonly ConversationTurn[] {
    return this._turns;
  }

  get turnCount(): number {
    return this._turns.length;
  }

  get elapsedSeconds(): number {
    return Math.floor((this.clock() - this.startedAt.getTime()) / 1000);
  }

  addTurn(question: string, answer: string): ConversationTurn {
    const turn: ConversationTurn = Object.freeze({ question, answer, timestamp: new Date(this.clock()) });
    this._turns.push(turn);
    this.log.info('Turn added', { turn: this.turnCount });
    return turn;
  }

  history(): HistoryEntry[] {
    return this._turns.map(({ question, answer }) => ({ question, answer }));
  }

  endReason(): SessionEndReason | null {
    if (this.turnCount >= this.limits.maxTurns) return 'max_turns';
    if (this.elapsedSeconds > this.limits.maxDurationSec) return 'max_duration';
    return null;
  }

  shouldEnd(): boolean {
    const reason = this.endReason();
    if (reason) this.log.info('Session limit reached', { reason, turns: this.turnCount });
    return reason !== null;
  }

  getSummary(): string {
    if (this._turns.length === 0) return 'No conversation history.';

    const lines = [`Helpline conversation summary (${formatStamp(this.startedAt)})`];
    this._turns.forEach((turn, i) => {
      lines.push('', `Question ${i + 1}:`, turn.question, '', `Answer ${i + 1}:`, turn.answer);
    });
    return lines.join('\n');
  }
}

function formatStamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}
