import { createLogger } from '@infobox-query/utils';
import { getEnv } from '@infobox-query/config';
import { buildApp } from './app.js';

const logger = createLogger({ service: 'server' });

async function main() {
  const env = getEnv();
  const app = await buildApp();

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Failed to close server');
          process.exit(1);
        }
      );
    });
  }

  try {
    await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    logger.info({ host: env.HOST, port: env.PORT }, 'Server started');
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Server crashed');
  process.exit(1);
});
