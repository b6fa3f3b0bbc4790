// modules/quiz/quiz.controller.tsx

import type { Request, Response } from 'express';
import type { AppConfig } from '../../config';
import { readListField, readTextField } from '../../lib/form';
import QuizPage from '../../views/QuizPage';
import { renderPage } from '../../views/render';
import ResultPage from '../../views/ResultPage';
import StartPage from '../../views/StartPage';
import type { QuizService } from './quiz.service';

type TokenRequest = Request<{ token: string }>;

// Invalid input and unknown tokens both land back on the start form, silently.
function backToStart(res: Response) {
  res.redirect(303, '/');
}

export function createQuizController(
  service: QuizService,
  config: Pick<AppConfig, 'testDurationSeconds' | 'questionsPerTest'>
) {
  function startPageHandler(_req: Request, res: Response) {
    res
      .type('html')
      .send(
        renderPage(
          <StartPage
            durationSeconds={config.testDurationSeconds}
            questionCount={config.questionsPerTest}
          />
        )
      );
  }

  async function beginAttemptHandler(req: Request, res: Response) {
    const outcome = await service.beginAttempt({
      surname: readTextField(req.body, 'surname'),
      name: readTextField(req.body, 'name'),
      group: readTextField(req.body, 'group'),
    });
    if (!outcome.success) {
      backToStart(res);
      return;
    }
    res.redirect(303, `/quiz/${encodeURIComponent(outcome.token)}`);
  }

  function attemptPageHandler(req: TokenRequest, res: Response) {
    const outcome = service.getAttemptView(req.params.token);
    if (!outcome.success) {
      backToStart(res);
      return;
    }
    res
      .type('html')
      .send(
        renderPage(
          <QuizPage session={outcome.session} remainingSeconds={outcome.remainingSeconds} />
        )
      );
  }

  function submitAttemptHandler(req: TokenRequest, res: Response) {
    const outcome = service.finishAttempt(req.params.token, readListField(req.body, 'answers'));
    if (!outcome.success) {
      backToStart(res);
      return;
    }
    res.type('html').send(renderPage(<ResultPage result={outcome.result} />));
  }

  return {
    startPageHandler,
    beginAttemptHandler,
    attemptPageHandler,
    submitAttemptHandler,
  };
}
