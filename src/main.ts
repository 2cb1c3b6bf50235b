// Main Entry Point - Market Sentiment Pipeline
// Starts the store, the daily scheduler and the dashboard API

import 'dotenv/config';

import configManager from './shared/config';
import logger from './shared/logger';
import { describeError } from './shared/errors';
import { createServices } from './services';
import { DashboardServer } from './dashboard/dashboard-server';

async function main(): Promise<void> {
  const config = configManager.get();
  logger.info(`[Main] ${config.app.name} v${config.app.version} starting (${config.app.environment})`);

  const services = createServices();
  const { engine, scheduler, store } = services;

  logger.info(`[Main] Sources: ${engine.listSources().join(', ')}`);
  const providers = services.providers.list()
    .map(name => configManager.canUseProvider(name) ? name : `${name} (no API key)`);
  logger.info(`[Main] Providers: ${providers.join(', ')}`);

  scheduler.start();

  const server = new DashboardServer({
    engine,
    scheduler,
    store,
    providers: services.providers,
    summarizer: services.summarizer,
    pipelinePassword: config.server.pipelinePassword,
    defaultProvider: config.scheduler.provider,
  });
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[Main] Received ${signal}, shutting down...`);

    scheduler.stop();

    if (engine.stop()) {
      logger.info('[Main] Waiting for the current article to finish');
      await new Promise<void>(resolve => engine.once('finished', () => resolve()));
    }

    try {
      await server.stop();
    } catch (error) {
      logger.error(`[Main] Error stopping dashboard server: ${describeError(error)}`);
    }

    store.close();
    logger.info('[Main] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      logger.error(`[Main] Error during shutdown: ${describeError(error)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error(`[Main] Unhandled Rejection: ${describeError(reason)}`);
  });
}

main().catch(error => {
  logger.error(`[Main] Fatal startup error: ${describeError(error)}`);
  process.exit(1);
});
