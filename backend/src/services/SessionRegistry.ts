import {
  ChatSession,
  RosterEntry,
  SessionChanges,
  toRosterEntry
} from '../models/ChatSession';
import { ConflictError, NotFoundError } from '../errors/ChatErrors';

/**
 * In-memory table of authenticated connections.
 *
 * Every method runs to completion without yielding, so a uniqueness check
 * and the write that depends on it can never be split by another event.
 * Callers only ever receive copies; stored records change through
 * `mutate` and `rename`.
 */
export class SessionRegistry {
  private sessions: Map<string, ChatSession> = new Map();

  insert(session: ChatSession): ChatSession {
    if (this.sessions.has(session.connectionId)) {
      throw new ConflictError('Connection is already logged in');
    }
    if (this.findRecord(session.room, session.username)) {
      throw new ConflictError('Username is already taken');
    }

    const record = { ...session };
    this.sessions.set(record.connectionId, record);
    return { ...record };
  }

  get(connectionId: string): ChatSession | undefined {
    const record = this.sessions.get(connectionId);
    return record ? { ...record } : undefined;
  }

  has(connectionId: string): boolean {
    return this.sessions.has(connectionId);
  }

  remove(connectionId: string): ChatSession {
    const record = this.sessions.get(connectionId);
    if (!record) {
      throw new NotFoundError(`No session for connection ${connectionId}`);
    }
    this.sessions.delete(connectionId);
    return record;
  }

  findByName(room: string, name: string): ChatSession | undefined {
    const record = this.findRecord(room, name);
    return record ? { ...record } : undefined;
  }

  isNameTaken(room: string, name: string): boolean {
    return this.findRecord(room, name) !== undefined;
  }

  listRoom(room: string): RosterEntry[] {
    const roster: RosterEntry[] = [];
    for (const session of this.sessions.values()) {
      if (session.room === room) {
        roster.push(toRosterEntry(session));
      }
    }
    return roster;
  }

  mutate(connectionId: string, fn: (current: Readonly<ChatSession>) => SessionChanges): ChatSession {
    const record = this.sessions.get(connectionId);
    if (!record) {
      throw new NotFoundError(`No session for connection ${connectionId}`);
    }
    Object.assign(record, fn({ ...record }));
    return { ...record };
  }

  /**
   * Renames a session if no one in its room (itself included) holds the
   * name case-insensitively. Returns the previous name.
   */
  rename(connectionId: string, name: string): { oldName: string; session: ChatSession } {
    const record = this.sessions.get(connectionId);
    if (!record) {
      throw new NotFoundError(`No session for connection ${connectionId}`);
    }
    if (this.findRecord(record.room, name)) {
      throw new ConflictError('Name has already been taken, try a different name.', 'server');
    }

    const oldName = record.username;
    record.username = name;
    return { oldName, session: { ...record } };
  }

  size(): number {
    return this.sessions.size;
  }

  private findRecord(room: string, name: string): ChatSession | undefined {
    const wanted = name.toLowerCase();
    for (const session of this.sessions.values()) {
      if (session.room === room && session.username.toLowerCase() === wanted) {
        return session;
      }
    }
    return undefined;
  }
}
