import { InboundEvent } from '../models/ChatEvents';
import { normalizeRoom, toHtmlColor, toRosterEntry } from '../models/ChatSession';
import { AuthenticationError, AuthorizationError, isChatError } from '../errors/ChatErrors';
import {
  drawingPayloadSchema,
  loginPayloadSchema,
  messagePayloadSchema,
  parsePayload,
  presencePayloadSchema
} from '../validation/chatSchemas';
import { CommandInterpreter, MUTED_NOTICE } from './CommandInterpreter';
import { IdentityValidator } from './IdentityValidator';
import { LoggerService } from './LoggerService';
import { LoginProtocol } from './LoginProtocol';
import { DEFAULT_PRESENCE_WINDOW_SECONDS, Clock, PresenceTracker, epochSeconds } from './PresenceTracker';
import { RoomBroadcastBus } from './RoomBroadcastBus';
import { SessionRegistry } from './SessionRegistry';
import { SettingsStore } from './SettingsStore';
import { TextTransform, emoteTransform } from './TextTransform';

export interface ChatEngineOptions {
  bus: RoomBroadcastBus;
  store: SettingsStore;
  transform?: TextTransform;
  presenceWindowSeconds?: number;
  clock?: Clock;
  random?: () => number;
  logger?: LoggerService;
}

/**
 * Owns the session registry and presence tracker and routes every inbound
 * socket event to the component that handles it. Errors raised by a
 * handler become a private notice to the connection that caused them.
 */
export class ChatEngine {
  readonly registry: SessionRegistry;
  readonly presence: PresenceTracker;
  private bus: RoomBroadcastBus;
  private login: LoginProtocol;
  private interpreter: CommandInterpreter;
  private logger: LoggerService;

  constructor(options: ChatEngineOptions) {
    this.logger = options.logger ?? new LoggerService('ChatEngine');
    this.bus = options.bus;
    this.registry = new SessionRegistry();
    this.presence = new PresenceTracker(
      options.presenceWindowSeconds ?? DEFAULT_PRESENCE_WINDOW_SECONDS,
      options.clock ?? epochSeconds
    );

    this.login = new LoginProtocol({
      registry: this.registry,
      presence: this.presence,
      bus: this.bus,
      identity: new IdentityValidator(options.store),
      logger: this.logger.child('login'),
      random: options.random
    });
    this.interpreter = new CommandInterpreter({
      registry: this.registry,
      presence: this.presence,
      bus: this.bus,
      store: options.store,
      transform: options.transform ?? emoteTransform,
      logger: this.logger.child('commands'),
      random: options.random
    });
  }

  async dispatch(event: InboundEvent): Promise<void> {
    try {
      await this.handle(event);
    } catch (error) {
      if (isChatError(error)) {
        this.logger.debug(`${event.type} rejected: ${error.message}`, { connectionId: event.connectionId });
        this.bus.emitTo(event.connectionId, error.channel, { msg: error.message });
        return;
      }
      this.logger.error(`Unhandled error in ${event.type} handler`, error, { connectionId: event.connectionId });
      this.bus.emitTo(event.connectionId, 'error', { msg: 'Internal server error' });
    }
  }

  viewerCount(streamer: string): number {
    return this.presence.liveCount(normalizeRoom(streamer));
  }

  private async handle(event: InboundEvent): Promise<void> {
    switch (event.type) {
      case 'connect':
        this.handleConnect(event.connectionId, event.address);
        break;
      case 'disconnect':
        this.handleDisconnect(event.connectionId);
        break;
      case 'presence': {
        const { streamer } = parsePayload(presencePayloadSchema, event.payload);
        this.presence.touch(event.connectionId, normalizeRoom(streamer));
        break;
      }
      case 'login':
        await this.login.login(
          { connectionId: event.connectionId, address: event.address },
          parsePayload(loginPayloadSchema, event.payload)
        );
        break;
      case 'message': {
        const { message } = parsePayload(messagePayloadSchema, event.payload);
        await this.interpreter.interpret(event.connectionId, message);
        break;
      }
      case 'get color':
        this.handleGetColor(event.connectionId);
        break;
      case 'drawing':
        this.handleDrawing(event.connectionId, parsePayload(drawingPayloadSchema, event.payload).src);
        break;
    }
  }

  private handleConnect(connectionId: string, address: string): void {
    // A reused id must never inherit an old identity.
    if (this.registry.has(connectionId)) {
      this.registry.remove(connectionId);
      this.logger.warn('Cleared stale session on connect', { connectionId });
    }
    this.logger.debug('Client connected', { connectionId, address });
  }

  private handleDisconnect(connectionId: string): void {
    this.presence.drop(connectionId);

    if (!this.registry.has(connectionId)) {
      this.logger.debug('Anonymous client disconnected', { connectionId });
      return;
    }

    const session = this.registry.remove(connectionId);
    this.bus.leave(connectionId, session.room);
    this.bus.emit(session.room, 'disconnected', {
      ...toRosterEntry(session),
      users: this.registry.listRoom(session.room)
    });
    this.logger.info(`${session.username} left ${session.room}`, { connectionId });
  }

  private handleGetColor(connectionId: string): void {
    const session = this.registry.get(connectionId);
    if (!session) {
      throw new AuthenticationError('User is not authenticated');
    }
    this.bus.emitTo(connectionId, 'return color', { color: toHtmlColor(session.color) });
  }

  private handleDrawing(connectionId: string, src: string): void {
    const session = this.registry.get(connectionId);
    if (!session) {
      throw new AuthenticationError('User is not authenticated');
    }
    this.presence.touch(connectionId, session.room);

    if (session.muted) {
      throw new AuthorizationError(MUTED_NOTICE);
    }
    this.bus.emit(session.room, 'drawing received', {
      ...toRosterEntry(session),
      src: src.trim()
    });
  }
}
