/**
 * backend/src/index.ts
 *
 * Process entrypoint: config → app → listen, plus graceful shutdown.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { errorFields, logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info('server.shutdown', { signal });

    void close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('server.shutdown_failed', errorFields(err));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
  });
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', errorFields(err));
  process.exit(1);
});
