import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  InsufficientQuestionsError,
  MalformedSourceError,
  SourceUnavailableError,
} from '../../lib/errors';
import { CsvQuestionSource, parseQuestions } from './questions.source';

const HEADER = 'question,option_a,option_b,option_c,option_d,correct';

function validRows(count: number): string[] {
  const labels = ['A', 'B', 'C', 'D'];
  return Array.from(
    { length: count },
    (_, i) => `Question ${i + 1},a${i + 1},b${i + 1},c${i + 1},d${i + 1},${labels[i % 4]}`
  );
}

describe('parseQuestions', () => {
  it('maps each row to a question with labeled options', () => {
    const questions = parseQuestions(
      [HEADER, 'Capital of France?,Berlin,Paris,Rome,Madrid,B'].join('\n')
    );

    expect(questions).toEqual([
      {
        text: 'Capital of France?',
        options: { A: 'Berlin', B: 'Paris', C: 'Rome', D: 'Madrid' },
        correctLabel: 'B',
      },
    ]);
  });

  it('normalizes the correct label and trims every field', () => {
    const [question] = parseQuestions(
      [HEADER, '  2 + 2?  , 3 , 4 , 5 , 6 ,  b '].join('\n')
    );

    expect(question).toEqual({
      text: '2 + 2?',
      options: { A: '3', B: '4', C: '5', D: '6' },
      correctLabel: 'B',
    });
  });

  it('keeps numeric-looking and date-looking text as written', () => {
    const [question] = parseQuestions([HEADER, 'Half?,1/2,007,1e3,0.50,A'].join('\n'));

    expect(question.options).toEqual({ A: '1/2', B: '007', C: '1e3', D: '0.50' });
  });

  it('accepts columns in any order and ignores extra ones', () => {
    const questions = parseQuestions(
      [
        'Correct,Topic,Option_D,Option_C,Option_B,Option_A,Question',
        'C,geo,d,c,b,a,Which one?',
      ].join('\n')
    );

    expect(questions).toEqual([
      {
        text: 'Which one?',
        options: { A: 'a', B: 'b', C: 'c', D: 'd' },
        correctLabel: 'C',
      },
    ]);
  });

  it('reads quoted fields containing commas', () => {
    const [question] = parseQuestions(
      [HEADER, '"Pick one, please","x, y",b,c,d,A'].join('\n')
    );

    expect(question.text).toBe('Pick one, please');
    expect(question.options.A).toBe('x, y');
  });

  it('skips rows with an unknown label or a blank field', () => {
    const questions = parseQuestions(
      [
        HEADER,
        'Good,a,b,c,d,D',
        'Bad label,a,b,c,d,E',
        'No label,a,b,c,d,',
        ',a,b,c,d,A',
        'Blank option,a,   ,c,d,A',
        'Also good,a,b,c,d,a',
      ].join('\n')
    );

    expect(questions.map((q) => q.text)).toEqual(['Good', 'Also good']);
  });

  it('ignores a byte order mark before the header', () => {
    const questions = parseQuestions(`\uFEFF${HEADER}\nQ,a,b,c,d,A`);

    expect(questions).toHaveLength(1);
  });

  it('reads non-ASCII text', () => {
    const [question] = parseQuestions(
      [HEADER, 'Столица России?,Москва,Казань,Омск,Тверь,A'].join('\n')
    );

    expect(question.text).toBe('Столица России?');
    expect(question.options.A).toBe('Москва');
  });

  it('names every missing column', () => {
    let error: unknown;
    try {
      parseQuestions('question,option_a,option_b\nQ,a,b');
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(MalformedSourceError);
    expect(error).toMatchObject({
      reasonCode: 'MALFORMED_SOURCE',
      missingColumns: ['option_c', 'option_d', 'correct'],
    });
  });

  it('treats an empty file as missing every column', () => {
    expect(() => parseQuestions('')).toThrow(
      'Question file is missing required columns: question, option_a, option_b, option_c, option_d, correct'
    );
  });
});

describe('CsvQuestionSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quiz-questions-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeBank(lines: string[]): string {
    const file = path.join(dir, 'questions.csv');
    fs.writeFileSync(file, lines.join('\n'), 'utf-8');
    return file;
  }

  it('loads every valid row when there are enough of them', async () => {
    const file = writeBank([HEADER, ...validRows(12)]);

    const questions = await new CsvQuestionSource(file, 10).loadAll();

    expect(questions).toHaveLength(12);
    expect(questions[11]).toEqual({
      text: 'Question 12',
      options: { A: 'a12', B: 'b12', C: 'c12', D: 'd12' },
      correctLabel: 'D',
    });
  });

  it('rejects a bank with fewer valid rows than required', async () => {
    const file = writeBank([HEADER, ...validRows(9), 'Broken,a,b,c,d,X']);

    const load = new CsvQuestionSource(file, 10).loadAll();

    await expect(load).rejects.toBeInstanceOf(InsufficientQuestionsError);
    await expect(load).rejects.toMatchObject({ found: 9, required: 10 });
  });

  it('reports the path of a missing file', async () => {
    const file = path.join(dir, 'absent.csv');

    const load = new CsvQuestionSource(file, 1).loadAll();

    await expect(load).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(load).rejects.toThrow(`Question file is unavailable: ${file}`);
  });

  it('reloads the file on every call', async () => {
    const file = writeBank([HEADER, ...validRows(2)]);
    const source = new CsvQuestionSource(file, 1);
    expect(await source.loadAll()).toHaveLength(2);

    writeBank([HEADER, ...validRows(3)]);

    expect(await source.loadAll()).toHaveLength(3);
  });

  it('does not modify the file', async () => {
    const file = writeBank([HEADER, ...validRows(2)]);
    const before = fs.readFileSync(file, 'utf-8');

    await new CsvQuestionSource(file, 1).loadAll();

    expect(fs.readFileSync(file, 'utf-8')).toBe(before);
  });
});
