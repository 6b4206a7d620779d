import type { ServerEventName, ServerEventPayloads } from '../../models/ChatEvents';
import type { RoomBroadcastBus } from '../../services/RoomBroadcastBus';

export interface Delivery {
  to: string;
  event: ServerEventName;
  payload: unknown;
  broadcast: boolean;
}

/**
 * In-process bus that records what each connection would have received.
 */
export class RecordingBroadcastBus implements RoomBroadcastBus {
  readonly deliveries: Delivery[] = [];
  private groups: Map<string, Set<string>> = new Map();

  join(connectionId: string, room: string): void {
    const group = this.groups.get(room) ?? new Set<string>();
    group.add(connectionId);
    this.groups.set(room, group);
  }

  leave(connectionId: string, room: string): void {
    this.groups.get(room)?.delete(connectionId);
  }

  members(room: string): string[] {
    return Array.from(this.groups.get(room) ?? []);
  }

  emit<E extends ServerEventName>(room: string, event: E, payload: ServerEventPayloads[E]): void {
    for (const connectionId of this.groups.get(room) ?? []) {
      this.deliveries.push({ to: connectionId, event, payload, broadcast: true });
    }
  }

  emitTo<E extends ServerEventName>(connectionId: string, event: E, payload: ServerEventPayloads[E]): void {
    this.deliveries.push({ to: connectionId, event, payload, broadcast: false });
  }

  received(connectionId: string): Array<{ event: ServerEventName; payload: unknown }> {
    return this.deliveries
      .filter(delivery => delivery.to === connectionId)
      .map(({ event, payload }) => ({ event, payload }));
  }

  notices(connectionId: string): string[] {
    const messages: string[] = [];
    for (const { event, payload } of this.received(connectionId)) {
      if ((event === 'server' || event === 'error' || event === 'warning') && isNotice(payload)) {
        messages.push(payload.msg);
      }
    }
    return messages;
  }

  clear(): void {
    this.deliveries.length = 0;
  }
}

function isNotice(payload: unknown): payload is { msg: string } {
  return typeof payload === 'object' && payload !== null && 'msg' in payload && typeof payload.msg === 'string';
}
