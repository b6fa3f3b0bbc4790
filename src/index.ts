import { createApp } from './app';
import { loadConfig } from './config';
import { CsvQuestionSource } from './modules/questions/questions.source';
import { SqliteResultStore } from './modules/results/results.repository';
import { SessionRegistry } from './modules/sessions/session.registry';

async function main() {
  const config = loadConfig();

  const results = await SqliteResultStore.open(config.resultsDb);
  results.init();

  const app = createApp({
    config,
    source: new CsvQuestionSource(config.questionsFile, config.questionsPerTest),
    sessions: new SessionRegistry(),
    results,
  });

  app.listen(config.port, () => {
    console.log(`Quiz listening on port ${config.port}`);
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
