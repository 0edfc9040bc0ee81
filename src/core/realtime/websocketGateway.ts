import type { Server as HttpServer } from 'node:http';

import { Server as SocketIoServer, type Socket } from 'socket.io';

import type {
  RealtimeClientCommand,
  SessionRealtimeEvent,
  WsConnectedPayload,
  WsEnvelope,
  WsErrorPayload,
  WsSubscriptionPayload,
} from '../@types';
import { logger } from '../shared/logger';
import type { SessionRealtimeBus } from './sessionRealtimeBus';

const SOCKET_IO_PATH = '/socket.io';

const nowIso = (): string => new Date().toISOString();

const toEnvelope = <TType extends string, TPayload>(
  type: TType,
  payload: TPayload,
  sessionId?: string,
): WsEnvelope<TType, TPayload> => ({
  type,
  timestamp: nowIso(),
  sessionId,
  payload,
});

export const toRoomName = (sessionId: string): string => `session:${sessionId}`;

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null;
};

export const parseClientCommand = (raw: unknown): RealtimeClientCommand | null => {
  if (!isRecord(raw)) {
    return null;
  }

  const { type, sessionId } = raw;
  if (type !== 'subscribe' && type !== 'unsubscribe' && type !== 'ping') {
    return null;
  }

  if (sessionId !== undefined && typeof sessionId !== 'string') {
    return null;
  }

  return { type, sessionId };
};

export const parseSessionId = (raw: unknown): string | null => {
  if (typeof raw === 'string') {
    return raw.trim() || null;
  }

  if (isRecord(raw) && typeof raw.sessionId === 'string') {
    return raw.sessionId.trim() || null;
  }

  return null;
};

/** Maps a bus event to the socket event name and envelope a subscriber receives. */
export const toSocketMessage = (
  event: SessionRealtimeEvent,
): { eventName: string; envelope: WsEnvelope<string, unknown> } => {
  switch (event.type) {
    case 'session_message':
      return {
        eventName: 'session.message',
        envelope: toEnvelope('session.message', event.message, event.sessionId),
      };
    case 'session_event':
      return {
        eventName: 'session.event',
        envelope: toEnvelope('session.event', event.event, event.sessionId),
      };
    case 'session_updated':
      return {
        eventName: 'session.updated',
        envelope: toEnvelope('session.updated', event.session, event.sessionId),
      };
  }
};

class SessionSocketGateway {
  private readonly io: SocketIoServer;
  private readonly unsubscribeRealtime: () => void;

  public constructor(server: HttpServer, realtimeBus: SessionRealtimeBus) {
    this.io = new SocketIoServer(server, {
      path: SOCKET_IO_PATH,
      cors: {
        origin: true,
        credentials: true,
      },
    });

    this.io.on('connection', (socket) => {
      this.handleConnection(socket);
    });

    this.unsubscribeRealtime = realtimeBus.subscribe((event) => {
      const { eventName, envelope } = toSocketMessage(event);
      this.io.to(toRoomName(event.sessionId)).emit(eventName, envelope);
    });
  }

  public close(): Promise<void> {
    this.unsubscribeRealtime();
    // Also closes the attached HTTP server.
    return this.io.close();
  }

  private handleConnection(socket: Socket): void {
    logger.info('socket_client_connected', {
      socketId: socket.id,
      transport: socket.conn.transport.name,
    });

    const connectedPayload: WsConnectedPayload = {
      connectionId: socket.id,
      endpoint: SOCKET_IO_PATH,
    };
    socket.emit('connection.ready', toEnvelope('connection.ready', connectedPayload));

    const querySessionId = parseSessionId(socket.handshake.query.sessionId);
    if (querySessionId) {
      this.subscribeSocketToSession(socket, querySessionId);
    }

    socket.on('disconnect', (reason) => {
      logger.info('socket_client_disconnected', {
        socketId: socket.id,
        reason,
      });
    });

    socket.on('subscribe', (payload: unknown) => {
      const sessionId = parseSessionId(payload);
      if (!sessionId) {
        this.emitError(socket, 'sessionId is required for subscribe event.');
        return;
      }

      this.subscribeSocketToSession(socket, sessionId);
    });

    socket.on('unsubscribe', (payload: unknown) => {
      const sessionId = parseSessionId(payload);
      if (!sessionId) {
        this.emitError(socket, 'sessionId is required for unsubscribe event.');
        return;
      }

      this.unsubscribeSocketFromSession(socket, sessionId);
    });

    socket.on('ping', () => {
      socket.emit('system.pong', toEnvelope('system.pong', { ok: true }));
    });

    socket.on('command', (payload: unknown) => {
      const command = parseClientCommand(payload);

      if (!command) {
        this.emitError(
          socket,
          'Invalid command payload. Expected { type: subscribe|unsubscribe|ping, sessionId?: string }.',
        );
        return;
      }

      if (command.type === 'ping') {
        socket.emit('system.pong', toEnvelope('system.pong', { ok: true }));
        return;
      }

      if (!command.sessionId) {
        this.emitError(socket, 'sessionId is required for subscribe/unsubscribe command.');
        return;
      }

      if (command.type === 'subscribe') {
        this.subscribeSocketToSession(socket, command.sessionId);
        return;
      }

      this.unsubscribeSocketFromSession(socket, command.sessionId);
    });
  }

  private emitError(socket: Socket, message: string): void {
    const errorPayload: WsErrorPayload = { message };
    socket.emit('system.error', toEnvelope('system.error', errorPayload));
  }

  private subscribeSocketToSession(socket: Socket, sessionId: string): void {
    void socket.join(toRoomName(sessionId));
    logger.info('socket_session_subscribed', {
      socketId: socket.id,
      sessionId,
    });

    const payload: WsSubscriptionPayload = { sessionId };
    socket.emit('subscription.confirmed', toEnvelope('subscription.confirmed', payload, sessionId));
  }

  private unsubscribeSocketFromSession(socket: Socket, sessionId: string): void {
    void socket.leave(toRoomName(sessionId));
    logger.info('socket_session_unsubscribed', {
      socketId: socket.id,
      sessionId,
    });

    const payload: WsSubscriptionPayload = { sessionId };
    socket.emit('subscription.removed', toEnvelope('subscription.removed', payload, sessionId));
  }
}

export interface WebSocketGateway {
  close(): Promise<void>;
}

export const attachSessionWebSocketGateway = (
  server: HttpServer,
  realtimeBus: SessionRealtimeBus,
): WebSocketGateway => {
  const gateway = new SessionSocketGateway(server, realtimeBus);

  logger.info('socket_gateway_started', { path: SOCKET_IO_PATH });

  return {
    close: () => gateway.close(),
  };
};
