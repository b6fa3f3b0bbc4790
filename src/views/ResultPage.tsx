import type { ResultRecord } from '../modules/results/result.model';
import Button from './components/Button';
import Card from './components/Card';
import PageHeader from './components/PageHeader';
import Layout from './Layout';

export default function ResultPage({ result }: { result: ResultRecord }) {
  return (
    <Layout title="Результат">
      <PageHeader title="Тест завершён" subtitle={`${result.surname} ${result.name}, ${result.group}`} />
      <Card title="Результат">
        <p className="score">
          {result.score} / {result.total}
        </p>
      </Card>
      <Button href="/" variant="secondary">
        На главную
      </Button>
    </Layout>
  );
}
