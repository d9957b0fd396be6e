import * as grpc from '@grpc/grpc-js';
import request from 'supertest';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { startSidecar, type RunningSidecar, type SidecarOptions } from '../src/sidecar';
import {
  EXTERNAL_PROCESSOR_PROTO,
  EXTERNAL_PROCESSOR_SERVICE,
  HEALTH_PROTO,
  HEALTH_SERVICE,
  loadServiceDefinition,
} from '../src/grpc/protoLoader';
import { ServingStatus } from '../src/health/healthRegistry';
import type { ProcessingRequest } from '../src/types/ExternalProcessing';
import { ListenerBindError } from '../src/utils/errors';

const SERVICE_NAME = 'envoy.service.ext_proc.v3.ExternalProcessor';

// Shapes as decoded by proto-loader on the client side.
interface DecodedSetHeader {
  header: { key: string; value: string };
  append_action: string;
}

interface DecodedResponse {
  response?: string;
  request_headers?: {
    response?: {
      status?: string;
      header_mutation?: { set_headers: DecodedSetHeader[]; remove_headers: string[] };
    };
  };
  request_body?: { response?: { status?: string } };
  immediate_response?: {
    status?: { code?: string };
    body?: Buffer;
    details?: string;
  };
}

interface DecodedHealth {
  status: string;
}

const processorService = loadServiceDefinition(EXTERNAL_PROCESSOR_PROTO, EXTERNAL_PROCESSOR_SERVICE);
const healthService = loadServiceDefinition(HEALTH_PROTO, HEALTH_SERVICE);

let sidecar: RunningSidecar;
let client: grpc.Client;

function sidecarOptions(overrides: Partial<SidecarOptions> = {}): SidecarOptions {
  return {
    host: '127.0.0.1',
    grpcPort: 0,
    healthPort: 0,
    serviceName: SERVICE_NAME,
    settings: {
      stampHeader: { key: 'x-processed-by', value: 'test-sidecar' },
      directiveHeaderName: 'x-header-instructions',
      stripDirectiveHeader: true,
    },
    drainTimeoutMs: 500,
    ...overrides,
  };
}

function openProcessCall(target: grpc.Client) {
  const method = processorService.Process;
  return target.makeBidiStreamRequest<ProcessingRequest, DecodedResponse>(
    method.path,
    method.requestSerialize,
    method.responseDeserialize
  );
}

const adminRequest: ProcessingRequest = {
  request_headers: { headers: { headers: [{ key: ':path', value: '/admin' }] }, end_of_stream: true },
};

function exchange(requests: ProcessingRequest[]): Promise<DecodedResponse[]> {
  return new Promise((resolve, reject) => {
    const call = openProcessCall(client);
    const responses: DecodedResponse[] = [];
    call.on('data', (response: DecodedResponse) => responses.push(response));
    call.on('error', reject);
    call.on('end', () => resolve(responses));
    for (const message of requests) {
      call.write(message);
    }
    call.end();
  });
}

function check(service: string): Promise<string> {
  const method = healthService.Check;
  return new Promise((resolve, reject) => {
    client.makeUnaryRequest<{ service: string }, DecodedHealth>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      { service },
      (error, response) => {
        if (error || !response) {
          reject(error ?? new Error('empty health response'));
          return;
        }
        resolve(response.status);
      }
    );
  });
}

function setHeaders(response: DecodedResponse): Array<[string, string, string]> {
  const mutation = response.request_headers?.response?.header_mutation;
  return (mutation?.set_headers ?? []).map((option) => [option.header.key, option.header.value, option.append_action]);
}

beforeAll(async () => {
  sidecar = await startSidecar(sidecarOptions());
  client = new grpc.Client(`127.0.0.1:${sidecar.grpcPort}`, grpc.credentials.createInsecure());
});

afterAll(async () => {
  client.close();
  await sidecar.stop();
});

describe('sidecar over gRPC', () => {
  it('mutates request headers sent as raw bytes', async () => {
    const responses = await exchange([
      {
        request_headers: {
          headers: { headers: [{ key: ':path', raw_value: Buffer.from('/admin/panel', 'utf8') }] },
          end_of_stream: false,
        },
      },
      { request_body: { body: Buffer.from('{}'), end_of_stream: true } },
    ]);

    expect(responses).toHaveLength(2);
    expect(responses[0].response).toBe('request_headers');
    expect(responses[0].request_headers?.response?.status).toBe('CONTINUE');
    expect(setHeaders(responses[0])).toEqual([
      ['x-processed-by', 'test-sidecar', 'APPEND_IF_EXISTS_OR_ADD'],
      ['x-admin-access', 'true', 'APPEND_IF_EXISTS_OR_ADD'],
    ]);
    expect(responses[1].response).toBe('request_body');
    expect(responses[1].request_body?.response?.status).toBe('CONTINUE');
  });

  it('finishes the call with status OK once the proxy half-closes', async () => {
    const call = openProcessCall(client);
    const events: string[] = [];
    const finished = new Promise<void>((resolve, reject) => {
      call.on('data', () => events.push('data'));
      call.on('status', (status: grpc.StatusObject) => events.push(`status ${status.code}`));
      call.on('error', reject);
      call.on('end', () => {
        events.push('end');
        resolve();
      });
    });
    call.write(adminRequest);
    call.end();

    await finished;
    expect(events).toEqual(['data', `status ${grpc.status.OK}`, 'end']);
  });

  it('rejects protected paths without authorization', async () => {
    const responses = await exchange([
      { request_headers: { headers: { headers: [{ key: ':path', value: '/protected/report' }] } } },
    ]);

    expect(responses).toHaveLength(1);
    const immediate = responses[0].immediate_response;
    expect(immediate?.status?.code).toBe('Unauthorized');
    expect(immediate?.body?.toString('utf8')).toBe('{"error":"Authorization required"}');
    expect(immediate?.details).toBe('authorization_required');
  });

  it('reports SERVING for the processor and the overall server once bound', async () => {
    await expect(check(SERVICE_NAME)).resolves.toBe('SERVING');
    await expect(check('')).resolves.toBe('SERVING');
  });

  it('reports UNKNOWN for untracked services and follows registry writes', async () => {
    await expect(check('not.a.Service')).resolves.toBe('UNKNOWN');
    sidecar.registry.setStatus('batch.Worker', ServingStatus.NOT_SERVING);
    await expect(check('batch.Worker')).resolves.toBe('NOT_SERVING');
  });

  it('answers the HTTP liveness probe regardless of registry content', async () => {
    sidecar.registry.setStatus('', ServingStatus.NOT_SERVING);
    const response = await request(`http://127.0.0.1:${sidecar.healthPort}`).get('/health');
    expect(response.status).toBe(200);
    expect(response.text).toBe('OK');
    sidecar.registry.setStatus('', ServingStatus.SERVING);
  });

  it('streams the current status and later changes over Watch, and unsubscribes on cancel', async () => {
    const { registry } = sidecar;
    const unsubscribed = vi.fn();
    const subscribe = registry.subscribe.bind(registry);
    const subscribeSpy = vi.spyOn(registry, 'subscribe').mockImplementation((name, listener) => {
      const unsubscribe = subscribe(name, listener);
      return () => {
        unsubscribed(name);
        unsubscribe();
      };
    });

    const method = healthService.Watch;
    const call = client.makeServerStreamRequest<{ service: string }, DecodedHealth>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      { service: 'batch.Watched' }
    );
    const callError = new Promise<grpc.ServiceError>((resolve) => call.on('error', resolve));
    const statuses: string[] = [];
    await new Promise<void>((resolve) => {
      call.on('data', (response: DecodedHealth) => {
        statuses.push(response.status);
        if (statuses.length === 1) {
          registry.setStatus('batch.Watched', ServingStatus.SERVING);
        } else {
          resolve();
        }
      });
    });
    call.cancel();

    await expect(callError).resolves.toMatchObject({ code: grpc.status.CANCELLED });
    await vi.waitFor(() => expect(unsubscribed).toHaveBeenCalledWith('batch.Watched'));
    subscribeSpy.mockRestore();
    expect(statuses).toEqual(['SERVICE_UNKNOWN', 'SERVING']);
  });
});

describe('sidecar startup and shutdown', () => {
  it('keeps serving gRPC when the health port is already taken', async () => {
    const takenPort = sidecar.healthPort;
    expect(takenPort).toBeDefined();
    const second = await startSidecar(sidecarOptions({ healthPort: takenPort ?? 0 }));
    try {
      expect(second.healthPort).toBeUndefined();
      expect(second.grpcPort).toBeGreaterThan(0);
      expect(second.registry.getStatus(SERVICE_NAME)).toBe(ServingStatus.SERVING);
    } finally {
      await second.stop();
    }
  });

  it('rejects with ListenerBindError when the gRPC port is taken', async () => {
    const failed = startSidecar(sidecarOptions({ grpcPort: sidecar.grpcPort }));
    await expect(failed).rejects.toBeInstanceOf(ListenerBindError);
    await expect(failed).rejects.toMatchObject({ listener: 'grpc', address: `127.0.0.1:${sidecar.grpcPort}` });
  });

  it('stops within the drain deadline while a processing stream is still open', async () => {
    const draining = await startSidecar(sidecarOptions({ drainTimeoutMs: 100 }));
    const drainingClient = new grpc.Client(`127.0.0.1:${draining.grpcPort}`, grpc.credentials.createInsecure());
    const call = openProcessCall(drainingClient);
    const callError = new Promise<Error>((resolve) => call.on('error', resolve));
    const firstResponse = new Promise<void>((resolve) => call.once('data', () => resolve()));

    call.write(adminRequest);
    await firstResponse;
    await draining.stop();

    expect(draining.registry.getStatus(SERVICE_NAME)).toBe(ServingStatus.NOT_SERVING);
    expect(draining.registry.getStatus('')).toBe(ServingStatus.NOT_SERVING);
    await expect(callError).resolves.toBeInstanceOf(Error);
    drainingClient.close();
  });
});
