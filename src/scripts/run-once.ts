// Run the pipeline once from the command line and exit
// Usage: run-once [--provider openai] [--model gpt-4o-mini] [--sources zawya.com,gulfnews.com]

import 'dotenv/config';
import { parseArgs } from 'util';

import configManager from '../shared/config';
import logger from '../shared/logger';
import { describeError } from '../shared/errors';
import { createServices } from '../services';

async function runOnce(): Promise<number> {
  const { values } = parseArgs({
    options: {
      provider: { type: 'string' },
      model: { type: 'string' },
      sources: { type: 'string' },
    },
  });

  const services = createServices();
  const { engine, store } = services;

  const sources = values.sources
    ? values.sources.split(',').map(id => id.trim()).filter(Boolean)
    : undefined;

  const handle = engine.start({
    provider: values.provider || configManager.get().scheduler.provider,
    model: values.model,
    sources,
  });

  const interrupt = () => {
    logger.info('[RunOnce] Interrupt received, stopping after the current article');
    engine.stop();
  };
  process.on('SIGINT', interrupt);

  const final = await handle.done;
  process.off('SIGINT', interrupt);
  store.close();

  console.log(`Run ${final.runId}: ${final.status}`);
  console.log(`  processed ${final.progress}/${final.total}`);
  console.log(`  sources failed:      ${final.stats.sourcesFailed}`);
  console.log(`  articles stored:     ${final.stats.articlesStored}`);
  console.log(`  extraction failures: ${final.stats.extractionFailures}`);
  console.log(`  analysis failures:   ${final.stats.analysisFailures}`);
  console.log(`  sentiments stored:   ${final.stats.sentimentsStored}`);
  if (final.error) console.log(`  error: ${final.error}`);

  return final.status === 'FAILED' ? 1 : 0;
}

runOnce()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error(`[RunOnce] ${describeError(error)}`);
    process.exit(1);
  });
