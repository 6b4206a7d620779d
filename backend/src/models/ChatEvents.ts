import { RosterEntry } from './ChatSession';

export interface Notice {
  msg: string;
}

export interface ChatLine extends RosterEntry {
  message: string;
}

export interface OccupancyChange extends RosterEntry {
  users: RosterEntry[];
}

export interface RenameNotice {
  oldname: string;
  newname: string;
  type: RosterEntry['type'];
  color: string;
  users: RosterEntry[];
}

export interface DrawingLine extends RosterEntry {
  src: string;
}

/**
 * Every event the server emits, keyed by its wire name.
 */
export interface ServerEventPayloads {
  'login success': { username: string };
  'login key required': { username: string };
  connected: OccupancyChange;
  disconnected: OccupancyChange;
  'message received': ChatLine;
  'action received': ChatLine;
  'drawing received': DrawingLine;
  rename: RenameNotice;
  userlist: { users: RosterEntry[] };
  'return color': { color: string };
  'password set': { password: string };
  'password activated': { username: string };
  'password deactivated': { username: string; msg: string };
  error: Notice;
  warning: Notice;
  server: Notice;
}

export type ServerEventName = keyof ServerEventPayloads;

export type InboundEvent =
  | { type: 'connect'; connectionId: string; address: string }
  | { type: 'disconnect'; connectionId: string }
  | { type: 'presence'; connectionId: string; payload: unknown }
  | { type: 'login'; connectionId: string; address: string; payload: unknown }
  | { type: 'message'; connectionId: string; payload: unknown }
  | { type: 'get color'; connectionId: string }
  | { type: 'drawing'; connectionId: string; payload: unknown };
