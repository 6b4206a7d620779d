import { v4 as uuidv4 } from 'uuid';

export interface StreamerSettings {
  username: string;
  key: string;
  description: string | null;
  password: string | null;
}

export interface StreamerSeed {
  username: string;
  key?: string;
  description?: string | null;
  password?: string | null;
}

export function generateStreamKey(): string {
  return uuidv4().replace(/-/g, '');
}

export function createStreamer(seed: StreamerSeed): StreamerSettings {
  return {
    username: seed.username,
    key: seed.key || generateStreamKey(),
    description: seed.description ?? null,
    password: seed.password ?? null
  };
}

// Fields safe to show to viewers; the key never leaves the server.
export interface StreamerSummary {
  username: string;
  live: boolean;
  count: number;
  description: string;
  locked: boolean;
}
