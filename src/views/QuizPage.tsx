import { OPTION_LABELS } from '../modules/questions/question.model';
import type { AttemptSession } from '../modules/sessions/session.model';
import Button from './components/Button';
import Card from './components/Card';
import PageHeader from './components/PageHeader';
import Timer from './components/Timer';
import Layout from './Layout';

interface QuizPageProps {
  session: AttemptSession;
  remainingSeconds: number;
}

export default function QuizPage({ session, remainingSeconds }: QuizPageProps) {
  const { candidate, questions } = session;

  return (
    <Layout title="Тест">
      <PageHeader
        title="Тест"
        subtitle={`${candidate.surname} ${candidate.name}, ${candidate.group}`}
      />
      <Timer remainingSeconds={remainingSeconds} />
      {/* one select per question keeps the submitted answers aligned by position */}
      <form id="quiz-form" method="post" action={`/submit/${encodeURIComponent(session.sessionId)}`}>
        {questions.map((q, index) => (
          <Card key={index} title={`${index + 1}. ${q.text}`}>
            <ul className="options">
              {OPTION_LABELS.map((label) => (
                <li key={label}>
                  <b>{label}.</b> {q.options[label]}
                </li>
              ))}
            </ul>
            <label className="field">
              Ответ
              <select name="answers" defaultValue="">
                <option value="">—</option>
                {OPTION_LABELS.map((label) => (
                  <option key={label} value={label}>
                    {label}
                  </option>
                ))}
              </select>
            </label>
          </Card>
        ))}
        <Button type="submit">Завершить тест</Button>
      </form>
    </Layout>
  );
}
