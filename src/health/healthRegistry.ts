import { EventEmitter } from 'node:events';

export const ServingStatus = {
  UNKNOWN: 'UNKNOWN',
  SERVING: 'SERVING',
  NOT_SERVING: 'NOT_SERVING',
} as const;

export type ServingStatus = (typeof ServingStatus)[keyof typeof ServingStatus];

export type StatusListener = (status: ServingStatus) => void;

/** Name under which the overall server status is tracked. */
export const OVERALL_SERVICE = '';

const CHANGE_EVENT = 'change';

/**
 * Service name to serving status. Writes are last-write-wins and keep no
 * history; unknown names read as UNKNOWN. One instance is created at startup
 * and handed to whoever reads or writes it.
 */
export class HealthRegistry {
  private readonly statuses = new Map<string, ServingStatus>();
  private readonly emitter = new EventEmitter();

  constructor(initial: Record<string, ServingStatus> = {}) {
    // one listener per Watch call
    this.emitter.setMaxListeners(0);
    for (const [name, status] of Object.entries(initial)) {
      this.statuses.set(name, status);
    }
  }

  setStatus(name: string, status: ServingStatus): void {
    const previous = this.statuses.get(name);
    this.statuses.set(name, status);
    if (previous !== status) {
      this.emitter.emit(CHANGE_EVENT, name, status);
    }
  }

  getStatus(name: string): ServingStatus {
    return this.statuses.get(name) ?? ServingStatus.UNKNOWN;
  }

  has(name: string): boolean {
    return this.statuses.has(name);
  }

  services(): string[] {
    return [...this.statuses.keys()];
  }

  /** Sets every tracked name, e.g. NOT_SERVING on shutdown. */
  setAll(status: ServingStatus): void {
    for (const name of this.services()) {
      this.setStatus(name, status);
    }
  }

  /**
   * Calls `listener` on every change of `name`. Returns the unsubscribe function.
   */
  subscribe(name: string, listener: StatusListener): () => void {
    const onChange = (changed: string, status: ServingStatus) => {
      if (changed === name) {
        listener(status);
      }
    };
    this.emitter.on(CHANGE_EVENT, onChange);
    return () => {
      this.emitter.off(CHANGE_EVENT, onChange);
    };
  }
}
