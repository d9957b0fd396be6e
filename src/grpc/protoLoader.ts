import path from 'path';
import * as protoLoader from '@grpc/proto-loader';
import type { ServiceDefinition } from '@grpc/grpc-js';

export const PROTO_ROOT = path.resolve(__dirname, '..', '..', 'proto');

export const EXTERNAL_PROCESSOR_PROTO = 'envoy/service/ext_proc/v3/external_processor.proto';
export const EXTERNAL_PROCESSOR_SERVICE = 'envoy.service.ext_proc.v3.ExternalProcessor';
export const HEALTH_PROTO = 'grpc/health/v1/health.proto';
export const HEALTH_SERVICE = 'grpc.health.v1.Health';

// Field names stay snake_case as in the .proto files; enums travel as names.
export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
  includeDirs: [PROTO_ROOT],
};

function isServiceDefinition(definition: protoLoader.AnyDefinition | undefined): definition is protoLoader.ServiceDefinition {
  return definition !== undefined && !('format' in definition);
}

export function loadServiceDefinition(protoFile: string, serviceName: string): ServiceDefinition {
  const packageDefinition = protoLoader.loadSync(protoFile, LOADER_OPTIONS);
  const definition = packageDefinition[serviceName];
  if (!isServiceDefinition(definition)) {
    throw new Error(`Service ${serviceName} not found in ${protoFile}`);
  }
  return definition;
}
