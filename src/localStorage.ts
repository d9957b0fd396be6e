import { AsyncLocalStorage } from 'node:async_hooks';

export interface StreamContext {
  streamId: string;
  peer: string;
  openedAt: string;
  eventsHandled: number;
  path?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<StreamContext>();

export function newStreamId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
}
