import { ConfigError } from './lib/errors';

export interface AppConfig {
  questionsFile: string;
  resultsDb: string;
  exportFile: string;
  testDurationSeconds: number;
  questionsPerTest: number;
  adminKey: string;
  port: number;
}

function readString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const value = (env[name] ?? '').trim();
  return value || fallback;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = (env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    questionsFile: readString(env, 'QUESTIONS_FILE', 'questions.csv'),
    resultsDb: readString(env, 'RESULTS_DB', 'results.db'),
    exportFile: readString(env, 'EXPORT_FILE', 'results.xlsx'),
    testDurationSeconds: readPositiveInt(env, 'TEST_DURATION_SECONDS', 600),
    questionsPerTest: readPositiveInt(env, 'QUESTIONS_PER_TEST', 10),
    adminKey: readString(env, 'ADMIN_KEY', 'change-me'),
    port: readPositiveInt(env, 'PORT', 8000),
  };
}
