import type { SessionEvent, SessionEventListener } from '../types/index.js';

export type SessionEventEmitter = {
  readonly emit: (event: SessionEvent) => void;
  /** Returns a function that removes the listener. */
  readonly subscribe: (listener: SessionEventListener) => () => void;
};

/**
 * Delivers events synchronously, in subscription order. A throwing listener
 * propagates into the turn that emitted the event.
 */
export function createSessionEventEmitter(): SessionEventEmitter {
  const listeners = new Set<SessionEventListener>();

  return {
    emit: (event: SessionEvent) => {
      for (const listener of [...listeners]) {
        listener(event);
      }
    },

    subscribe: (listener: SessionEventListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
