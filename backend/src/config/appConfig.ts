import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5678),
  CORS_ORIGIN: z.string().default('*'),

  // Streamer records (username, key, description, password)
  STREAMERS_FILE: z.string().default('streamers.json'),

  // Where the media pipeline writes HLS playlists
  HLS_DIR: z.string().default('media/hls'),
  HLS_PLAYLIST_LENGTH: z.coerce.number().int().positive().default(30), // seconds
  VIDEO_QUALITIES: z.string().default(''),

  PRESENCE_WINDOW_SECONDS: z.coerce.number().int().positive().default(30)
});

export interface AppConfig {
  port: number;
  corsOrigin: string | string[];
  streamersFile: string;
  hlsDir: string;
  hlsPlaylistLength: number;
  videoQualities: string[];
  presenceWindowSeconds: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const origins = parsed.CORS_ORIGIN.split(',').map((origin) => origin.trim()).filter(Boolean);

  return {
    port: parsed.PORT,
    corsOrigin: origins.length === 1 && origins[0] === '*' ? '*' : origins,
    streamersFile: path.resolve(process.cwd(), parsed.STREAMERS_FILE),
    hlsDir: path.resolve(process.cwd(), parsed.HLS_DIR),
    hlsPlaylistLength: parsed.HLS_PLAYLIST_LENGTH,
    videoQualities: parsed.VIDEO_QUALITIES.split(',').map((quality) => quality.trim()).filter(Boolean),
    presenceWindowSeconds: parsed.PRESENCE_WINDOW_SECONDS
  };
}
