// modules/quiz/grading.service.ts

import type { Question } from '../questions/question.model';

export interface AttemptScore {
  score: number;
  total: number;
}

/**
 * Compares answers position by position with the assigned questions.
 * Missing answers count as wrong.
 */
export function gradeAnswers(
  questions: readonly Question[],
  answers: readonly string[]
): AttemptScore {
  let score = 0;

  questions.forEach((q, index) => {
    const given = (answers[index] ?? '').trim().toUpperCase();
    if (given === q.correctLabel) {
      score += 1;
    }
  });

  return { score, total: questions.length };
}
