import { Server as SocketIOServer } from 'socket.io';
import { ServerEventName, ServerEventPayloads } from '../models/ChatEvents';

/**
 * Best-effort delivery to a room's connections or to a single connection.
 * Nothing is queued or retried; whoever is connected at the time of the
 * call receives the event.
 */
export interface RoomBroadcastBus {
  join(connectionId: string, room: string): void;
  leave(connectionId: string, room: string): void;
  emit<E extends ServerEventName>(room: string, event: E, payload: ServerEventPayloads[E]): void;
  emitTo<E extends ServerEventName>(connectionId: string, event: E, payload: ServerEventPayloads[E]): void;
}

// socket.io puts every socket in a room named after its own id, so chat
// rooms get a prefix that a socket id can never collide with.
export function roomChannel(room: string): string {
  return `stream:${room}`;
}

export class SocketIoBroadcastBus implements RoomBroadcastBus {
  private io: SocketIOServer;

  constructor(io: SocketIOServer) {
    this.io = io;
  }

  join(connectionId: string, room: string): void {
    this.io.in(connectionId).socketsJoin(roomChannel(room));
  }

  leave(connectionId: string, room: string): void {
    this.io.in(connectionId).socketsLeave(roomChannel(room));
  }

  emit<E extends ServerEventName>(room: string, event: E, payload: ServerEventPayloads[E]): void {
    this.io.to(roomChannel(room)).emit(event, payload);
  }

  emitTo<E extends ServerEventName>(connectionId: string, event: E, payload: ServerEventPayloads[E]): void {
    this.io.to(connectionId).emit(event, payload);
  }
}
