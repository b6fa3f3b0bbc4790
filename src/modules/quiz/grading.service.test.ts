import { describe, expect, it } from 'vitest';
import type { OptionLabel, Question } from '../questions/question.model';
import { gradeAnswers } from './grading.service';

function questionsWithKey(labels: OptionLabel[]): Question[] {
  return labels.map((correctLabel, i) => ({
    text: `Q${i + 1}`,
    options: { A: 'a', B: 'b', C: 'c', D: 'd' },
    correctLabel,
  }));
}

const KEY: OptionLabel[] = ['A', 'B', 'C', 'D', 'A', 'B', 'C', 'D', 'A', 'B'];

describe('gradeAnswers', () => {
  it('gives full marks for the exact key in order', () => {
    expect(gradeAnswers(questionsWithKey(KEY), [...KEY])).toEqual({ score: 10, total: 10 });
  });

  it('gives zero when every answer is wrong', () => {
    const wrong = KEY.map((label) => (label === 'A' ? 'B' : 'A'));

    expect(gradeAnswers(questionsWithKey(KEY), wrong)).toEqual({ score: 0, total: 10 });
  });

  it('gives zero for blank answers', () => {
    expect(gradeAnswers(questionsWithKey(KEY), KEY.map(() => ''))).toEqual({ score: 0, total: 10 });
  });

  it('treats missing trailing answers as wrong', () => {
    expect(gradeAnswers(questionsWithKey(KEY), KEY.slice(0, 4))).toEqual({ score: 4, total: 10 });
  });

  it('is order sensitive', () => {
    const questions = questionsWithKey(['A', 'B']);

    expect(gradeAnswers(questions, ['B', 'A'])).toEqual({ score: 0, total: 2 });
  });

  it('trims and upper-cases answers before comparing', () => {
    const questions = questionsWithKey(['A', 'B', 'C']);

    expect(gradeAnswers(questions, [' a ', 'b', 'C '])).toEqual({ score: 3, total: 3 });
  });

  it('ignores answers beyond the assigned questions', () => {
    const questions = questionsWithKey(['A']);

    expect(gradeAnswers(questions, ['A', 'A', 'A'])).toEqual({ score: 1, total: 1 });
  });
});
