import compression from 'compression';
import express from 'express';
import type { AppConfig } from './config';
import { errorHandler } from './middlewares/errorHandler.middleware';
import { createAdminRouter } from './modules/admin/admin.routes';
import { ResultsExporter } from './modules/export/export.service';
import type { QuestionSource } from './modules/questions/questions.source';
import { createQuizRouter } from './modules/quiz/quiz.routes';
import { QuizService } from './modules/quiz/quiz.service';
import type { ResultStore } from './modules/results/result.model';
import type { SessionRegistry } from './modules/sessions/session.registry';

export interface AppDeps {
  config: AppConfig;
  source: QuestionSource;
  sessions: SessionRegistry;
  results: ResultStore;
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const app = express();

  const quiz = new QuizService({
    source: deps.source,
    sessions: deps.sessions,
    results: deps.results,
    questionsPerTest: config.questionsPerTest,
    testDurationSeconds: config.testDurationSeconds,
  });
  const exporter = new ResultsExporter(deps.results, config.adminKey);

  app.use(compression());
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  app.get('/ping', (_req, res) => {
    res.type('text').send('OK');
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use(
    '/admin',
    createAdminRouter({
      exporter,
      results: deps.results,
      adminKey: config.adminKey,
      exportFile: config.exportFile,
    })
  );
  app.use(createQuizRouter(quiz, config));

  app.use((_req, res) => {
    res.status(404).json({ status: 'not_found' });
  });

  app.use(errorHandler);

  return app;
}
