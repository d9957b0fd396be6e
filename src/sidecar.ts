import type { Server } from 'http';
import type * as grpc from '@grpc/grpc-js';
import logger from './utils/logger';
import { createHealthApp, listenHealthApp } from './healthApp';
import { HealthRegistry, OVERALL_SERVICE, ServingStatus } from './health/healthRegistry';
import { bindGrpcServer, createGrpcServer, shutdownGrpcServer } from './grpc/server';
import type { PipelineSettings } from './utils/mutationPipeline';
import { errorMessage } from './utils/errors';

export interface SidecarOptions {
  host: string;
  grpcPort: number;
  healthPort: number;
  serviceName: string;
  settings: PipelineSettings;
  /** How long stop() waits for open gRPC calls before cancelling them. */
  drainTimeoutMs: number;
}

export interface RunningSidecar {
  registry: HealthRegistry;
  grpcPort: number;
  /** Undefined when the health listener failed to start. */
  healthPort?: number;
  stop(): Promise<void>;
}

function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Starts the HTTP health listener and the gRPC listener. A health listener
 * failure is logged and tolerated; a gRPC bind failure closes the health
 * listener again and rejects. The registry
 * reports SERVING only once the gRPC port is bound.
 */
export async function startSidecar(options: SidecarOptions): Promise<RunningSidecar> {
  const registry = new HealthRegistry();

  let healthServer: Server | undefined;
  let healthPort: number | undefined;
  try {
    healthServer = await listenHealthApp(createHealthApp(), options.host, options.healthPort);
    const address = healthServer.address();
    healthPort = address && typeof address === 'object' ? address.port : options.healthPort;
    logger.info(`Health check server listening on http://${options.host}:${healthPort}/health`);
  } catch (err) {
    logger.error({ event: 'HEALTH_LISTENER_FAILED', message: errorMessage(err) });
  }

  const grpcServer: grpc.Server = createGrpcServer(options.settings, registry);
  let grpcPort: number;
  try {
    grpcPort = await bindGrpcServer(grpcServer, options.host, options.grpcPort);
  } catch (err) {
    grpcServer.forceShutdown();
    if (healthServer) {
      await closeHttpServer(healthServer);
    }
    throw err;
  }
  logger.info(`gRPC server listening on ${options.host}:${grpcPort}`);

  registry.setStatus(options.serviceName, ServingStatus.SERVING);
  registry.setStatus(OVERALL_SERVICE, ServingStatus.SERVING);
  logger.info(`Health status of "${options.serviceName}" and overall server set to SERVING`);

  return {
    registry,
    grpcPort,
    healthPort,
    async stop() {
      registry.setAll(ServingStatus.NOT_SERVING);
      await shutdownGrpcServer(grpcServer, options.drainTimeoutMs);
      if (healthServer) {
        await closeHttpServer(healthServer);
      }
    },
  };
}
