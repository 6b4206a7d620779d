import { promises as fsp } from 'fs';
import fs from 'fs';
import { z } from 'zod';
import { StreamerSeed, StreamerSettings, createStreamer } from '../models/Streamer';
import { LoggerService } from './LoggerService';

/**
 * Source of truth for streamer identity, keys, descriptions and passwords.
 * Lookups are by streamer name, case-insensitive.
 */
export interface SettingsStore {
  lookupStreamer(name: string): Promise<StreamerSettings | undefined>;
  findByKey(key: string): Promise<StreamerSettings | undefined>;
  listStreamers(): Promise<StreamerSettings[]>;
  updateDescription(name: string, description: string): Promise<void>;
  updatePassword(name: string, password: string | null): Promise<void>;
}

export class InMemorySettingsStore implements SettingsStore {
  protected streamers: Map<string, StreamerSettings> = new Map();

  constructor(seeds: StreamerSeed[] = []) {
    for (const seed of seeds) {
      const streamer = createStreamer(seed);
      this.streamers.set(streamer.username.toLowerCase(), streamer);
    }
  }

  async lookupStreamer(name: string): Promise<StreamerSettings | undefined> {
    const streamer = this.streamers.get(name.toLowerCase());
    return streamer ? { ...streamer } : undefined;
  }

  async findByKey(key: string): Promise<StreamerSettings | undefined> {
    const streamer = Array.from(this.streamers.values()).find(s => s.key === key);
    return streamer ? { ...streamer } : undefined;
  }

  async listStreamers(): Promise<StreamerSettings[]> {
    return Array.from(this.streamers.values()).map(s => ({ ...s }));
  }

  async updateDescription(name: string, description: string): Promise<void> {
    this.require(name).description = description;
  }

  async updatePassword(name: string, password: string | null): Promise<void> {
    this.require(name).password = password;
  }

  protected require(name: string): StreamerSettings {
    const streamer = this.streamers.get(name.toLowerCase());
    if (!streamer) {
      throw new Error(`Unknown streamer '${name}'`);
    }
    return streamer;
  }
}

type StreamerChanges = Partial<Pick<StreamerSettings, 'description' | 'password'>>;

const streamerFileSchema = z.array(
  z.object({
    username: z.string().min(1),
    key: z.string().min(1).optional(),
    description: z.string().nullish(),
    password: z.string().nullish()
  })
);

/**
 * Streamer records kept in a JSON file. The file is read once at startup;
 * description and password changes are written back in full.
 */
export class JsonFileSettingsStore extends InMemorySettingsStore {
  private filePath: string;
  private logger: LoggerService;
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(filePath: string, seeds: StreamerSeed[], logger: LoggerService) {
    super(seeds);
    this.filePath = filePath;
    this.logger = logger;
  }

  static async open(filePath: string, logger: LoggerService = new LoggerService('SettingsStore')): Promise<JsonFileSettingsStore> {
    let seeds: StreamerSeed[] = [];

    if (fs.existsSync(filePath)) {
      const raw: unknown = JSON.parse(await fsp.readFile(filePath, 'utf8'));
      seeds = streamerFileSchema.parse(raw);
    } else {
      logger.warn('Streamer file not found, starting with no streamers', { filePath });
    }

    const store = new JsonFileSettingsStore(filePath, seeds, logger);

    const generated = seeds.filter(seed => !seed.key).map(seed => seed.username);
    for (const username of generated) {
      const streamer = await store.lookupStreamer(username);
      logger.info(`Generated stream key for ${username}`, { key: streamer?.key });
    }
    if (generated.length > 0) {
      await store.persist();
    }

    logger.info(`Loaded ${seeds.length} streamer(s)`, { filePath });
    return store;
  }

  async updateDescription(name: string, description: string): Promise<void> {
    await this.commit(name, { description });
  }

  async updatePassword(name: string, password: string | null): Promise<void> {
    await this.commit(name, { password });
  }

  // The record changes only once the file holding the change is written.
  private commit(name: string, changes: StreamerChanges): Promise<void> {
    const record = this.require(name);
    return this.persist(
      (current) => current.map(streamer => (streamer === record ? { ...record, ...changes } : streamer)),
      () => Object.assign(record, changes)
    );
  }

  // Writes are chained so two quick updates can't interleave on disk.
  private persist(
    transform: (current: StreamerSettings[]) => StreamerSettings[] = (current) => current,
    onWritten: () => void = () => undefined
  ): Promise<void> {
    const write = this.writeChain.then(async () => {
      const snapshot = JSON.stringify(transform(Array.from(this.streamers.values())), null, 2);
      await fsp.writeFile(this.filePath, `${snapshot}\n`, 'utf8');
      onWritten();
    });
    this.writeChain = write.catch((error: unknown) => {
      this.logger.error('Failed to write streamer file', error, { filePath: this.filePath });
    });
    return write;
  }
}
