// modules/quiz/quiz.service.ts

import type { QuestionSource } from '../questions/questions.source';
import { sampleWithoutReplacement } from '../questions/sample';
import type { ResultRecord, ResultStore } from '../results/result.model';
import type { AttemptSession, CandidateIdentity } from '../sessions/session.model';
import type { SessionRegistry } from '../sessions/session.registry';
import { gradeAnswers } from './grading.service';

export type QuizFailure =
  | { success: false; reasonCode: 'INVALID_INPUT' }
  | { success: false; reasonCode: 'SESSION_NOT_FOUND' };

export type BeginAttemptResult = { success: true; token: string } | QuizFailure;

export type AttemptViewResult =
  | { success: true; session: AttemptSession; remainingSeconds: number }
  | QuizFailure;

export type FinishAttemptResult = { success: true; result: ResultRecord } | QuizFailure;

export interface QuizServiceDeps {
  source: QuestionSource;
  sessions: SessionRegistry;
  results: ResultStore;
  questionsPerTest: number;
  testDurationSeconds: number;
  random?: () => number;
}

const NOT_FOUND: QuizFailure = { success: false, reasonCode: 'SESSION_NOT_FOUND' };

export function normalizeCandidate(input: {
  surname: string;
  name: string;
  group: string;
}): CandidateIdentity | null {
  const candidate = {
    surname: input.surname.trim(),
    name: input.name.trim(),
    group: input.group.trim(),
  };
  if (!candidate.surname || !candidate.name || !candidate.group) return null;
  return candidate;
}

/**
 * Attempt lifecycle: not started → in progress (session registered) →
 * completed (result stored, session removed). A completed token is unknown.
 */
export class QuizService {
  private readonly random: () => number;

  constructor(private readonly deps: QuizServiceDeps) {
    this.random = deps.random ?? Math.random;
  }

  async beginAttempt(input: {
    surname: string;
    name: string;
    group: string;
  }): Promise<BeginAttemptResult> {
    const candidate = normalizeCandidate(input);
    if (!candidate) {
      return { success: false, reasonCode: 'INVALID_INPUT' };
    }

    const bank = await this.deps.source.loadAll();
    const questions = sampleWithoutReplacement(bank, this.deps.questionsPerTest, this.random);
    const token = this.deps.sessions.create(candidate, questions);

    console.log(`[quiz] attempt started ${token.slice(0, 8)}… (${questions.length} questions)`);
    return { success: true, token };
  }

  getAttemptView(token: string): AttemptViewResult {
    const session = this.deps.sessions.get(token);
    if (!session) return NOT_FOUND;

    // advisory only: late submissions are still graded.
    // Measured on the registry clock that stamped startedAt.
    const elapsedSeconds = (this.deps.sessions.now() - session.startedAt) / 1000;
    const remainingSeconds = Math.max(
      0,
      Math.floor(this.deps.testDurationSeconds - elapsedSeconds)
    );

    return { success: true, session, remainingSeconds };
  }

  finishAttempt(token: string, answers: readonly string[]): FinishAttemptResult {
    const session = this.deps.sessions.get(token);
    if (!session) return NOT_FOUND;

    const { score, total } = gradeAnswers(session.questions, answers);
    const result = this.deps.results.insert({ ...session.candidate, score, total });
    this.deps.sessions.remove(token);

    console.log(`[quiz] attempt graded ${token.slice(0, 8)}…: ${score}/${total}`);
    return { success: true, result };
  }
}
