// app.ts
import logger from './utils/logger';
import {
  GRPC_PORT,
  HEALTH_PORT,
  LISTEN_HOST,
  PIPELINE_SETTINGS,
  PROCESSOR_SERVICE_NAME,
  SHUTDOWN_DRAIN_TIMEOUT_MS,
} from './config/env';
import { startSidecar } from './sidecar';
import { errorMessage } from './utils/errors';

async function main() {
  logger.info('Starting external processing sidecar');

  const sidecar = await startSidecar({
    host: LISTEN_HOST,
    grpcPort: GRPC_PORT,
    healthPort: HEALTH_PORT,
    serviceName: PROCESSOR_SERVICE_NAME,
    settings: PIPELINE_SETTINGS,
    drainTimeoutMs: SHUTDOWN_DRAIN_TIMEOUT_MS,
  });

  logger.info(`Stamping requests with ${PIPELINE_SETTINGS.stampHeader.key}: ${PIPELINE_SETTINGS.stampHeader.value}`);
  logger.info('Ready to receive processing streams');

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, marking services NOT_SERVING and draining`);
    sidecar.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ event: 'SHUTDOWN_FAILED', message: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ event: 'STARTUP_FAILED', message: errorMessage(err) });
  process.exit(1);
});
