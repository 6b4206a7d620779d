export const DEFAULT_PRESENCE_WINDOW_SECONDS = 30;

export type Clock = () => number;

/** Current UTC epoch time in whole seconds. */
export const epochSeconds: Clock = () => Math.floor(Date.now() / 1000);

interface PresenceRecord {
  room: string;
  timestamp: number;
}

/**
 * Last-activity heartbeats per connection, independent of login. Stale
 * records are not swept; they simply stop counting once they fall outside
 * the window.
 */
export class PresenceTracker {
  private records: Map<string, PresenceRecord> = new Map();
  private windowSeconds: number;
  private clock: Clock;

  constructor(windowSeconds: number = DEFAULT_PRESENCE_WINDOW_SECONDS, clock: Clock = epochSeconds) {
    this.windowSeconds = windowSeconds;
    this.clock = clock;
  }

  touch(connectionId: string, room: string): void {
    this.records.set(connectionId, { room, timestamp: this.clock() });
  }

  liveCount(room: string): number {
    const oldest = this.clock() - this.windowSeconds;
    let count = 0;
    for (const record of this.records.values()) {
      if (record.room === room && record.timestamp >= oldest) {
        count++;
      }
    }
    return count;
  }

  drop(connectionId: string): boolean {
    return this.records.delete(connectionId);
  }
}
