import { Server as HttpServer } from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { InboundEvent } from '../models/ChatEvents';
import { ChatEngine } from './ChatEngine';
import { LoggerService } from './LoggerService';
import { SocketIoBroadcastBus } from './RoomBroadcastBus';
import { SettingsStore } from './SettingsStore';
import { TextTransform } from './TextTransform';

export interface ChatServiceOptions {
  store: SettingsStore;
  corsOrigin: string | string[];
  presenceWindowSeconds?: number;
  transform?: TextTransform;
}

/**
 * socket.io front for the chat engine. Each connection's events are
 * handled one at a time in arrival order; different connections run
 * concurrently.
 */
export class ChatService {
  private io: SocketIOServer;
  private engine: ChatEngine;
  private logger = new LoggerService('ChatService');
  private queues: Map<string, Promise<void>> = new Map();

  constructor(httpServer: HttpServer, options: ChatServiceOptions) {
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: options.corsOrigin,
        methods: ['GET', 'POST']
      }
    });

    this.engine = new ChatEngine({
      bus: new SocketIoBroadcastBus(this.io),
      store: options.store,
      transform: options.transform,
      presenceWindowSeconds: options.presenceWindowSeconds
    });

    this.setupSocketHandlers();
    this.logger.info('Initialized');
  }

  private setupSocketHandlers(): void {
    this.io.on('connection', (socket: Socket) => {
      const connectionId = socket.id;
      const address = socket.handshake.address;

      this.logger.debug(`Client connected: ${connectionId}`, { address });
      this.enqueue({ type: 'connect', connectionId, address });

      socket.on('presence', (payload: unknown) => {
        this.enqueue({ type: 'presence', connectionId, payload });
      });

      socket.on('login', (payload: unknown) => {
        this.enqueue({ type: 'login', connectionId, address, payload });
      });

      socket.on('message', (payload: unknown) => {
        this.enqueue({ type: 'message', connectionId, payload });
      });

      socket.on('get color', () => {
        this.enqueue({ type: 'get color', connectionId });
      });

      socket.on('drawing', (payload: unknown) => {
        this.enqueue({ type: 'drawing', connectionId, payload });
      });

      socket.on('disconnect', (reason: string) => {
        this.logger.debug(`Client disconnected: ${connectionId}`, { reason });
        this.enqueue({ type: 'disconnect', connectionId });
      });
    });
  }

  private enqueue(event: InboundEvent): void {
    const previous = this.queues.get(event.connectionId) ?? Promise.resolve();
    const next = previous
      .then(() => this.engine.dispatch(event))
      .catch((error: unknown) => {
        this.logger.error(`Failed to handle ${event.type}`, error, { connectionId: event.connectionId });
      })
      .finally(() => {
        if (this.queues.get(event.connectionId) === next) {
          this.queues.delete(event.connectionId);
        }
      });
    this.queues.set(event.connectionId, next);
  }

  viewerCount(streamer: string): number {
    return this.engine.viewerCount(streamer);
  }

  sessionCount(): number {
    return this.engine.registry.size();
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.io.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }
}
