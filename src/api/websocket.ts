/**
 * WebSocket live event feed.
 * Broadcasts committed governance transitions (proposal.created, vote.cast,
 * operation.queued, ...) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventEnvelope, EventType } from '../infra/eventBus.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

const toJson = (value: unknown): string => JSON.stringify(
  value,
  (_key, inner: unknown) => (typeof inner === 'bigint' ? inner.toString() : inner),
);

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  const unsubscribe = eventBus.on('*', (event: EventType, envelope: EventEnvelope) => {
    const message = toJson({
      type: event,
      eventId: envelope.eventId,
      ledgerTime: envelope.ts,
      data: envelope.data,
    });

    for (const ws of clients) {
      if (ws.readyState === 1 /* OPEN */) {
        ws.send(message);
      }
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    // Send a welcome message with the current client count.
    socket.send(toJson({
      type: 'connected',
      data: { clients: clients.size },
      ts: new Date().toISOString(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });
}
