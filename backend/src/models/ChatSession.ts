export enum ChatRole {
  ADMIN = 'admin',
  MODERATOR = 'moderator',
  NORMAL = 'normal'
}

export interface ChatSession {
  connectionId: string;
  address: string;
  room: string;
  username: string;
  admin: boolean;
  moderator: boolean;
  muted: boolean;
  color: number; // 0..0xFFFFFF
}

export type SessionChanges = Partial<Pick<ChatSession, 'username' | 'moderator' | 'muted' | 'color'>>;

/**
 * Public projection of a session, as it appears in rosters and in every
 * identity-bearing broadcast.
 */
export interface RosterEntry {
  username: string;
  type: ChatRole;
  color: string;
}

export interface ConnectionInfo {
  connectionId: string;
  address: string;
}

export function roleOf(session: ChatSession): ChatRole {
  if (session.admin) {
    return ChatRole.ADMIN;
  }
  if (session.moderator) {
    return ChatRole.MODERATOR;
  }
  return ChatRole.NORMAL;
}

export function hasModeratorPermission(session: ChatSession): boolean {
  return session.admin || session.moderator;
}

export function toHtmlColor(color: number): string {
  return '#' + color.toString(16).padStart(6, '0');
}

export function toRosterEntry(session: ChatSession): RosterEntry {
  return {
    username: session.username,
    type: roleOf(session),
    color: toHtmlColor(session.color)
  };
}

// Display names are limited in characters, not UTF-16 units.
export function nameLength(name: string): number {
  return Array.from(name).length;
}

export function normalizeRoom(streamer: string): string {
  return streamer.trim().toLowerCase();
}
