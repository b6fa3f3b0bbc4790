// modules/quiz/quiz.routes.ts

import express, { Router } from 'express';
import type { AppConfig } from '../../config';
import { createQuizController } from './quiz.controller';
import type { QuizService } from './quiz.service';

export function createQuizRouter(
  service: QuizService,
  config: Pick<AppConfig, 'testDurationSeconds' | 'questionsPerTest'>
): Router {
  const router = Router();
  const controller = createQuizController(service, config);

  router.use(express.urlencoded({ extended: false }));

  router.get('/', controller.startPageHandler);
  router.post('/start', controller.beginAttemptHandler);
  router.get('/quiz/:token', controller.attemptPageHandler);
  router.post('/submit/:token', controller.submitAttemptHandler);

  return router;
}
