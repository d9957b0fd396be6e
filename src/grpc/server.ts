import * as grpc from '@grpc/grpc-js';
import type { HealthRegistry } from '../health/healthRegistry';
import type { PipelineSettings } from '../utils/mutationPipeline';
import logger from '../utils/logger';
import { ListenerBindError } from '../utils/errors';
import { createExternalProcessorHandlers } from './externalProcessor';
import { createHealthHandlers } from './healthService';
import {
  EXTERNAL_PROCESSOR_PROTO,
  EXTERNAL_PROCESSOR_SERVICE,
  HEALTH_PROTO,
  HEALTH_SERVICE,
  loadServiceDefinition,
} from './protoLoader';

export function createGrpcServer(settings: PipelineSettings, registry: HealthRegistry): grpc.Server {
  const server = new grpc.Server();
  server.addService(
    loadServiceDefinition(EXTERNAL_PROCESSOR_PROTO, EXTERNAL_PROCESSOR_SERVICE),
    createExternalProcessorHandlers(settings)
  );
  server.addService(loadServiceDefinition(HEALTH_PROTO, HEALTH_SERVICE), createHealthHandlers(registry));
  return server;
}

/**
 * Binds without TLS and resolves with the bound port (useful with port 0).
 */
export function bindGrpcServer(server: grpc.Server, host: string, port: number): Promise<number> {
  const address = `${host}:${port}`;
  return new Promise((resolve, reject) => {
    server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error) {
        reject(new ListenerBindError(`Failed to bind gRPC listener on ${address}: ${error.message}`, 'grpc', address, error));
        return;
      }
      resolve(boundPort);
    });
  });
}

/**
 * Lets open calls finish for up to `drainTimeoutMs`, then cancels whatever is
 * left. Watch calls never finish on their own, so the deadline always applies
 * while one is open.
 */
export function shutdownGrpcServer(server: grpc.Server, drainTimeoutMs: number): Promise<void> {
  return new Promise((resolve) => {
    const deadline = setTimeout(() => {
      logger.warn({ event: 'GRPC_DRAIN_TIMEOUT', message: `Open calls still running after ${drainTimeoutMs} ms, forcing shutdown` });
      server.forceShutdown();
      resolve();
    }, drainTimeoutMs);

    server.tryShutdown((error) => {
      clearTimeout(deadline);
      if (error) {
        logger.warn({ event: 'GRPC_SHUTDOWN_FAILED', message: error.message });
        server.forceShutdown();
      }
      resolve();
    });
  });
}
