import Button from './components/Button';
import Card from './components/Card';
import PageHeader from './components/PageHeader';
import Layout from './Layout';

interface StartPageProps {
  durationSeconds: number;
  questionCount: number;
}

export default function StartPage({ durationSeconds, questionCount }: StartPageProps) {
  const minutes = Math.ceil(durationSeconds / 60);

  return (
    <Layout title="Тестирование">
      <PageHeader
        title="Тестирование"
        subtitle={`Вопросов: ${questionCount}. Время: ${minutes} мин.`}
      />
      <Card>
        <form method="post" action="/start">
          <label className="field">
            Фамилия
            <input name="surname" required autoComplete="family-name" />
          </label>
          <label className="field">
            Имя
            <input name="name" required autoComplete="given-name" />
          </label>
          <label className="field">
            Группа
            <input name="group" required />
          </label>
          <Button type="submit">Начать тест</Button>
        </form>
      </Card>
    </Layout>
  );
}
