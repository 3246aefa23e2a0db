import { EventType, eventBus } from './eventBus.js';
import { LedgerClock } from './ledger/clock.js';
import { EventLogger } from './logger.js';
import { StateStore } from './storage/stateStore.js';

/**
 * Publishes state transitions to the event bus and the event log once the
 * surrounding transaction commits. Rolled-back transitions are never published.
 */
export class TransitionPublisher {
  constructor(
    private readonly store: StateStore,
    private readonly clock: LedgerClock,
    private readonly logger: EventLogger,
  ) {}

  publish(type: EventType, data: Record<string, unknown>): void {
    const ts = this.clock.now();
    this.store.afterCommit(() => {
      const envelope = eventBus.emit(type, data, ts);
      this.logger.enqueue('info', type, { eventId: envelope.eventId, ledgerTime: ts, ...data });
    });
  }
}
