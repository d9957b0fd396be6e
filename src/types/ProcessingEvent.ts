import type { HeaderEntry } from './HeaderMutation';

export type ProcessingEvent =
  | { kind: 'requestHeaders'; headers: HeaderEntry[]; endOfStream: boolean }
  | { kind: 'requestBody'; endOfStream: boolean }
  | { kind: 'requestTrailers' }
  | { kind: 'responseHeaders'; endOfStream: boolean }
  | { kind: 'responseBody'; endOfStream: boolean }
  | { kind: 'responseTrailers' };
