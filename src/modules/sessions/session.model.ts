import type { Question } from '../questions/question.model';

export interface CandidateIdentity {
  surname: string;
  name: string;
  group: string;
}

export interface AttemptSession {
  sessionId: string;
  candidate: CandidateIdentity;
  questions: readonly Question[];
  startedAt: number;
}
