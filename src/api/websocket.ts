/**
 * WebSocket live event feed.
 * Broadcasts ledger notifications (proposal.created, proposal.voted,
 * proposal.closed, admin.transferred) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { EventBus, EventPayload, EventType } from '../infra/eventBus.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const WS_OPEN = 1;

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

const toFeedMessage = (event: EventType, data: EventPayload): string => JSON.stringify({
  type: event,
  data,
  ts: isoNow(),
});

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance, events: EventBus): Promise<void> {
  const unsubscribe = events.on('*', (event, data) => {
    const message = toFeedMessage(event, data);

    for (const ws of clients) {
      if (ws.readyState === WS_OPEN) {
        ws.send(message);
      }
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(JSON.stringify({
      type: 'connected',
      data: { clients: clients.size },
      ts: isoNow(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });
}
