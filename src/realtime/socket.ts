import { Server as SocketServer } from 'socket.io';
import type { Server as HttpServer } from 'node:http';
import { config } from '../config.js';
import type { SubscriberSet } from './subscribers.js';

/**
 * Set up Socket.IO with the /presence namespace. Each connected client is a
 * subscriber to the per-tick `tenants` event (a JSON string).
 */
export function setupSocketIO(server: HttpServer, subscribers: SubscriberSet) {
  const io = new SocketServer(server, {
    cors: {
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
    },
    pingInterval: 25000,
    pingTimeout: 10000,
  });

  const presenceNs = io.of('/presence');

  presenceNs.on('connection', (socket) => {
    subscribers.add({
      id: socket.id,
      send: (payload) => {
        socket.emit('tenants', payload);
      },
      close: () => {
        socket.disconnect(true);
      },
    });

    // We don't expect client messages, but log them
    socket.onAny((event: string) => {
      console.log(`[Socket.IO] From client ${socket.id}: ${event}`);
    });

    socket.on('disconnect', (reason) => {
      subscribers.remove(socket.id);
      console.log(`[Socket.IO] /presence client disconnected: ${socket.id} (${reason})`);
    });
  });

  console.log('[Socket.IO] WebSocket server initialized with /presence namespace');

  return { io, presenceNs };
}
