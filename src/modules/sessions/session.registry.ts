// modules/sessions/session.registry.ts

import crypto from 'crypto';
import type { Question } from '../questions/question.model';
import type { AttemptSession, CandidateIdentity } from './session.model';

/**
 * In-memory attempt sessions keyed by a random bearer token.
 *
 * Every method is synchronous, so each call completes on the event loop
 * without interleaving with another request. Entries live until removed;
 * nothing survives a restart and nothing is shared between processes.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, AttemptSession>();

  constructor(readonly now: () => number = Date.now) {}

  create(candidate: CandidateIdentity, questions: readonly Question[]): string {
    const sessionId = crypto.randomUUID();
    this.sessions.set(sessionId, {
      sessionId,
      candidate: { ...candidate },
      questions: questions.map((q) => ({ ...q, options: { ...q.options } })),
      startedAt: this.now(),
    });
    return sessionId;
  }

  get(token: string): AttemptSession | null {
    return this.sessions.get(token) ?? null;
  }

  remove(token: string): void {
    this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }
}
