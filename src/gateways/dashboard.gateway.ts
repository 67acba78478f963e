import { Server as HttpServer } from 'http';
import { Server, Socket } from 'socket.io';
import { BroadcastService } from '../services/broadcast.service';
import { isValidApiKey } from '../middleware/auth';
import { logger } from '../utils/logger';

const roomFor = (phone: string) => `chat:${phone}`;

function phoneFromHandshake(socket: Socket): string | null {
  const raw = socket.handshake.query.phone_number;
  const phone = Array.isArray(raw) ? raw[0] : raw;
  return typeof phone === 'string' && /^\d+$/.test(phone) ? phone : null;
}

function apiKeyFromHandshake(socket: Socket): unknown {
  const auth: unknown = socket.handshake.auth;
  if (typeof auth === 'object' && auth !== null && 'apiKey' in auth) {
    return auth.apiKey;
  }
  return socket.handshake.headers['x-api-key'];
}

/**
 * Streams a conversation's messages to dashboard clients. Each client watches
 * one phone number and receives `message` events as they are published.
 */
export function attachDashboardGateway(httpServer: HttpServer, broadcast: BroadcastService): Server {
  const io = new Server(httpServer, { path: '/ws', cors: { origin: true } });
  const subscriptions = new Map<string, () => void>();

  io.use((socket, next) => {
    if (!isValidApiKey(apiKeyFromHandshake(socket))) {
      return next(new Error('Invalid API key'));
    }
    if (!phoneFromHandshake(socket)) {
      return next(new Error('phone_number query parameter required'));
    }
    next();
  });

  io.on('connection', (socket) => {
    const phone = phoneFromHandshake(socket);
    if (!phone) {
      socket.disconnect(true);
      return;
    }

    const room = roomFor(phone);
    void socket.join(room);

    // One broadcast subscription per watched phone, shared by every socket in its room.
    if (!subscriptions.has(phone)) {
      subscriptions.set(
        phone,
        broadcast.subscribe(phone, (message) => {
          io.to(room).emit('message', message);
        })
      );
    }

    logger.info('Dashboard client connected', { phone, socketId: socket.id });

    socket.on('disconnect', () => {
      const remaining = io.sockets.adapter.rooms.get(room)?.size ?? 0;
      if (remaining === 0) {
        subscriptions.get(phone)?.();
        subscriptions.delete(phone);
      }
      logger.info('Dashboard client disconnected', { phone, socketId: socket.id });
    });
  });

  return io;
}
