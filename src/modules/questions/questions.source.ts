// modules/questions/questions.source.ts

import fs from 'fs';
import * as XLSX from 'xlsx';
import {
  InsufficientQuestionsError,
  MalformedSourceError,
  SourceUnavailableError,
} from '../../lib/errors';
import { isOptionLabel, OPTION_LABELS, Question } from './question.model';

export const REQUIRED_COLUMNS = [
  'question',
  'option_a',
  'option_b',
  'option_c',
  'option_d',
  'correct',
] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

const OPTION_COLUMNS = {
  A: 'option_a',
  B: 'option_b',
  C: 'option_c',
  D: 'option_d',
} as const;

export interface QuestionSource {
  loadAll(): Promise<Question[]>;
}

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

function readTable(content: string): string[][] {
  const text = content.replace(/^\uFEFF/, '');
  if (!text.trim()) return [];

  // raw: cells stay text ("1/2", "007"), no date or number coercion
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
  });
  return rows.map((row) => row.map(normalizeText));
}

/**
 * Parses a question table: header row first, then one question per row.
 * Rows with an unknown correct label or any blank field are skipped.
 */
export function parseQuestions(content: string): Question[] {
  const [header = [], ...rows] = readTable(content);
  const names = header.map((name) => name.toLowerCase());

  const missing = REQUIRED_COLUMNS.filter((column) => !names.includes(column));
  if (missing.length) {
    throw new MalformedSourceError(missing);
  }

  const index = (column: Column) => names.indexOf(column);
  const questions: Question[] = [];

  for (const row of rows) {
    const cell = (column: Column) => row[index(column)] ?? '';

    const correct = cell('correct').toUpperCase();
    if (!isOptionLabel(correct)) continue;

    const text = cell('question');
    const options = {
      A: cell(OPTION_COLUMNS.A),
      B: cell(OPTION_COLUMNS.B),
      C: cell(OPTION_COLUMNS.C),
      D: cell(OPTION_COLUMNS.D),
    };
    if (!text || OPTION_LABELS.some((label) => !options[label])) continue;

    questions.push({ text, options, correctLabel: correct });
  }

  return questions;
}

/** Reads the question bank from a CSV file on every call. */
export class CsvQuestionSource implements QuestionSource {
  constructor(
    private readonly filePath: string,
    private readonly minimumCount: number
  ) {}

  async loadAll(): Promise<Question[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      throw new SourceUnavailableError(this.filePath, { cause: err });
    }

    const questions = parseQuestions(content);
    if (questions.length < this.minimumCount) {
      throw new InsufficientQuestionsError(questions.length, this.minimumCount);
    }
    return questions;
  }
}
