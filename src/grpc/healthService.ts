import type * as grpc from '@grpc/grpc-js';
import type { HealthRegistry, ServingStatus } from '../health/healthRegistry';
import logger from '../utils/logger';

export interface HealthCheckRequest {
  service?: string;
}

// SERVICE_UNKNOWN only exists on the wire, for Watch on untracked names.
export type WireServingStatus = ServingStatus | 'SERVICE_UNKNOWN';

export interface HealthCheckResponse {
  status: WireServingStatus;
}

export function checkStatus(registry: HealthRegistry, request: HealthCheckRequest): HealthCheckResponse {
  return { status: registry.getStatus(request.service ?? '') };
}

export function watchStatus(registry: HealthRegistry, service: string): WireServingStatus {
  return registry.has(service) ? registry.getStatus(service) : 'SERVICE_UNKNOWN';
}

/**
 * grpc.health.v1.Health backed by the registry. Check reports UNKNOWN for
 * names the registry does not track.
 */
export function createHealthHandlers(registry: HealthRegistry) {
  return {
    Check: (
      call: grpc.ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
      callback: grpc.sendUnaryData<HealthCheckResponse>
    ) => {
      callback(null, checkStatus(registry, call.request));
    },

    Watch: (call: grpc.ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) => {
      const service = call.request.service ?? '';
      call.write({ status: watchStatus(registry, service) });

      const unsubscribe = registry.subscribe(service, (status) => {
        call.write({ status });
      });
      call.on('cancelled', () => {
        logger.debug({ event: 'HEALTH_WATCH_CANCELLED', service });
        unsubscribe();
      });
      call.on('error', unsubscribe);
    },
  };
}
