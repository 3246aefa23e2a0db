/**
 * Simple in-memory pub/sub event bus.
 * Services publish committed transitions here; the WebSocket feed and the event log subscribe.
 */

import { v4 as uuid } from 'uuid';

export type EventType =
  | 'proposal.created'
  | 'vote.cast'
  | 'proposal.finalized'
  | 'proposal.executed'
  | 'operation.queued'
  | 'operation.executed'
  | 'operation.cancelled'
  | 'timelock.delay.updated'
  | 'quorum.updated'
  | 'role.granted'
  | 'role.revoked';

/** Delivered at least once; consumers dedupe on `eventId`. */
export interface EventEnvelope<T = unknown> {
  eventId: string;
  type: EventType;
  ts: number;
  data: T;
}

export type EventCallback = (event: EventType, envelope: EventEnvelope) => void;

export type ListenerErrorReporter = (event: EventType, error: unknown) => void;

const reportToStderr: ListenerErrorReporter = (event, error) => {
  console.error(`event listener for ${event} failed`, error);
};

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private reportListenerError: ListenerErrorReporter = reportToStderr;

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener is reported
   * and does not stop delivery to the others.
   */
  emit<T>(event: EventType, data: T, ts: number): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = { eventId: uuid(), type: event, ts, data };
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];

    for (const cb of targets) {
      try {
        cb(event, envelope);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }

    return envelope;
  }

  onListenerError(reporter: ListenerErrorReporter): void {
    this.reportListenerError = reporter;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.reportListenerError = reportToStderr;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
