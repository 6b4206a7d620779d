import { timingSafeEqual } from 'crypto';
import { StreamerSettings } from '../models/Streamer';
import { AuthenticationError, NotFoundError } from '../errors/ChatErrors';
import { SettingsStore } from './SettingsStore';

export type IdentityClaim =
  | { kind: 'viewer'; streamer: StreamerSettings }
  | { kind: 'admin'; streamer: StreamerSettings }
  | { kind: 'key-required'; streamer: StreamerSettings };

/**
 * Confirms that a room's streamer exists and, when someone logs in under
 * the streamer's own name, that they hold the stream key.
 */
export class IdentityValidator {
  private store: SettingsStore;

  constructor(store: SettingsStore) {
    this.store = store;
  }

  async lookupStreamer(room: string): Promise<StreamerSettings> {
    const streamer = await this.store.lookupStreamer(room);
    if (!streamer) {
      throw new NotFoundError('Streamer does not exist');
    }
    return streamer;
  }

  async validate(room: string, username: string, key?: string | null): Promise<IdentityClaim> {
    const streamer = await this.lookupStreamer(room);

    if (username.toLowerCase() !== streamer.username.toLowerCase()) {
      return { kind: 'viewer', streamer };
    }
    if (key === undefined || key === null) {
      return { kind: 'key-required', streamer };
    }
    if (!keysMatch(key, streamer.key)) {
      throw new AuthenticationError('Invalid password!');
    }
    return { kind: 'admin', streamer };
  }
}

export function keysMatch(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
