// healthApp.ts
import Koa from 'koa';
import type { Server } from 'http';
import healthRouter from './routes/health';
import { loggerMiddleware } from './middleware/logger';
import logger from './utils/logger';
import { ListenerBindError } from './utils/errors';

export function createHealthApp(): Koa {
  const app = new Koa();

  // Order do matters
  app.use(loggerMiddleware);
  app.use(healthRouter.routes());
  app.use(healthRouter.allowedMethods());

  return app;
}

export function listenHealthApp(app: Koa, host: string, port: number): Promise<Server> {
  const address = `${host}:${port}`;
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    const onBindError = (error: Error) => {
      reject(new ListenerBindError(`Failed to bind health listener on ${address}: ${error.message}`, 'health', address, error));
    };
    server.once('error', onBindError);
    server.once('listening', () => {
      server.off('error', onBindError);
      server.on('error', (error: Error) => {
        logger.error({ event: 'HEALTH_LISTENER_ERROR', message: error.message });
      });
      resolve(server);
    });
  });
}
