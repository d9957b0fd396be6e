import * as grpc from '@grpc/grpc-js';
import logger from '../utils/logger';
import { asyncLocalStorage, newStreamId, type StreamContext } from '../localStorage';
import type { Outcome } from '../types/HeaderMutation';
import type { ProcessingEvent } from '../types/ProcessingEvent';
import type { ProcessingRequest, ProcessingResponse } from '../types/ExternalProcessing';
import { applyMutations, compileHeaderMutation, toHeaderEntries } from '../utils/headerMutation';
import { extractAttributes, type PipelineSettings, runMutationPipeline } from '../utils/mutationPipeline';
import { asError, errorMessage, ProtocolViolationError, StreamTransportError } from '../utils/errors';

/**
 * The part of a gRPC duplex call the dispatcher relies on.
 */
export interface ProcessingStream extends AsyncIterable<ProcessingRequest> {
  write(message: ProcessingResponse, callback: (error?: Error | null) => void): boolean;
  getPeer?: () => string;
}

function logStreamEvent(level: 'debug' | 'info' | 'warn' | 'error', event: string, message: string, extra: Record<string, unknown> = {}) {
  const store = asyncLocalStorage.getStore();
  logger[level]({
    timestamp: new Date().toISOString(),
    streamId: store?.streamId,
    peer: store?.peer,
    path: store?.path,
    event,
    message,
    ...extra,
  });
}

export function toProcessingEvent(request: ProcessingRequest): ProcessingEvent | null {
  if (request.request_headers) {
    return {
      kind: 'requestHeaders',
      headers: toHeaderEntries(request.request_headers.headers),
      endOfStream: request.request_headers.end_of_stream ?? false,
    };
  }
  if (request.request_body) {
    return { kind: 'requestBody', endOfStream: request.request_body.end_of_stream ?? false };
  }
  if (request.request_trailers) {
    return { kind: 'requestTrailers' };
  }
  if (request.response_headers) {
    return { kind: 'responseHeaders', endOfStream: request.response_headers.end_of_stream ?? false };
  }
  if (request.response_body) {
    return { kind: 'responseBody', endOfStream: request.response_body.end_of_stream ?? false };
  }
  if (request.response_trailers) {
    return { kind: 'responseTrailers' };
  }
  return null;
}

export function outcomeToResponse(outcome: Outcome): ProcessingResponse {
  switch (outcome.kind) {
    case 'continue':
      return {
        request_headers: {
          response: { status: 'CONTINUE', header_mutation: compileHeaderMutation(outcome.mutations) },
        },
      };
    case 'terminal':
      return {
        immediate_response: {
          status: { code: outcome.statusCode },
          headers: compileHeaderMutation(outcome.headers.map((header) => ({ operation: 'overwrite' as const, header }))),
          body: outcome.body,
          details: outcome.details,
        },
      };
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled outcome ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * One response per event. Only request headers go through the pipeline;
 * every other phase gets an explicit, unmodified continue of its own kind.
 */
export function respondToEvent(event: ProcessingEvent, settings: PipelineSettings): ProcessingResponse {
  switch (event.kind) {
    case 'requestHeaders': {
      const outcome = runMutationPipeline(event.headers, settings);
      if (outcome.kind === 'terminal') {
        logStreamEvent('info', 'REQUEST_REJECTED', `Request rejected with status ${outcome.statusCode}`, { details: outcome.details });
      } else if (logger.isLevelEnabled('debug')) {
        logStreamEvent('debug', 'HEADERS_MUTATED', `${outcome.mutations.length} header mutation(s)`, {
          headers: applyMutations(event.headers, outcome.mutations),
        });
      }
      return outcomeToResponse(outcome);
    }
    case 'requestBody':
      return { request_body: { response: { status: 'CONTINUE' } } };
    case 'requestTrailers':
      return { request_trailers: {} };
    case 'responseHeaders':
      return { response_headers: { response: { status: 'CONTINUE' } } };
    case 'responseBody':
      return { response_body: { response: { status: 'CONTINUE' } } };
    case 'responseTrailers':
      return { response_trailers: {} };
    default: {
      const unreachable: never = event;
      throw new Error(`Unhandled event ${JSON.stringify(unreachable)}`);
    }
  }
}

function sendResponse(stream: ProcessingStream, response: ProcessingResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    const onWritten = (error?: Error | null) => {
      if (error) {
        reject(new StreamTransportError(`Failed to send response: ${error.message}`, 'send', error));
        return;
      }
      resolve();
    };
    try {
      stream.write(response, onWritten);
    } catch (err) {
      reject(new StreamTransportError(`Failed to send response: ${errorMessage(err)}`, 'send', asError(err)));
    }
  });
}

/**
 * Drives one processing stream until the proxy half-closes it (resolves) or
 * a receive, send or protocol failure ends it (rejects). Each response is
 * fully written before the next message is read.
 */
export async function processStream(stream: ProcessingStream, settings: PipelineSettings): Promise<void> {
  const context: StreamContext = {
    streamId: newStreamId(),
    peer: stream.getPeer?.() ?? 'unknown',
    openedAt: new Date().toISOString(),
    eventsHandled: 0,
  };

  return asyncLocalStorage.run(context, async () => {
    logStreamEvent('debug', 'STREAM_OPEN', 'Processing stream opened');
    const iterator = stream[Symbol.asyncIterator]();

    for (;;) {
      let next: IteratorResult<ProcessingRequest>;
      try {
        next = await iterator.next();
      } catch (err) {
        throw new StreamTransportError(`Failed to receive message: ${errorMessage(err)}`, 'receive', asError(err));
      }

      if (next.done) {
        logStreamEvent('debug', 'STREAM_CLOSED', `Stream ended after ${context.eventsHandled} event(s)`);
        return;
      }

      const event = toProcessingEvent(next.value);
      if (!event) {
        throw new ProtocolViolationError('Processing request carries no recognised request variant');
      }
      if (event.kind === 'requestHeaders') {
        context.path = extractAttributes(event.headers, settings.directiveHeaderName).path;
      }

      logStreamEvent('debug', 'EVENT_RECEIVED', `Received ${event.kind}`);
      await sendResponse(stream, respondToEvent(event, settings));
      context.eventsHandled += 1;
    }
  });
}

function statusFor(error: Error): grpc.status {
  if (error instanceof ProtocolViolationError) {
    return grpc.status.INVALID_ARGUMENT;
  }
  if (error instanceof StreamTransportError) {
    return grpc.status.UNAVAILABLE;
  }
  return grpc.status.INTERNAL;
}

type ProcessCall = grpc.ServerDuplexStream<ProcessingRequest, ProcessingResponse>;

/**
 * Adapts the grpc-js call. The default Readable iterator destroys the call
 * once the proxy half-closes, after which `end()` can no longer send the
 * final status, so the call is read without destroy-on-return.
 */
export function toProcessingStream(call: ProcessCall): ProcessingStream {
  return {
    [Symbol.asyncIterator]: () => call.iterator({ destroyOnReturn: false }),
    write: (message, callback) => call.write(message, callback),
    getPeer: () => call.getPeer(),
  };
}

export function createExternalProcessorHandlers(settings: PipelineSettings) {
  return {
    Process: (call: ProcessCall) => {
      processStream(toProcessingStream(call), settings).then(
        () => call.end(),
        (err: unknown) => {
          const error = asError(err);
          logger.error({ event: 'STREAM_FAILED', error: error.message, name: error.name, peer: call.getPeer() });
          if (!call.cancelled) {
            call.emit('error', { code: statusFor(error), details: error.message });
          }
        }
      );
    },
  };
}
