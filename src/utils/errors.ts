/**
 * Receive or send failure on a processing stream. Ends that stream only.
 */
export class StreamTransportError extends Error {
  constructor(
    message: string,
    public direction: 'receive' | 'send',
    public originalError?: Error
  ) {
    super(message);
    this.name = 'StreamTransportError';
  }
}

/**
 * The proxy sent a message this processor cannot interpret.
 */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolViolationError';
  }
}

/**
 * A listener could not bind its address.
 */
export class ListenerBindError extends Error {
  constructor(
    message: string,
    public listener: 'grpc' | 'health',
    public address: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ListenerBindError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
