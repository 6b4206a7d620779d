import { ChatSession, ConnectionInfo, nameLength, normalizeRoom, toRosterEntry } from '../models/ChatSession';
import { AuthenticationError, ConflictError, ValidationError } from '../errors/ChatErrors';
import { LoginPayload } from '../validation/chatSchemas';
import { resolveColorOrDefault } from './ColorResolver';
import { IdentityValidator } from './IdentityValidator';
import { LoggerService } from './LoggerService';
import { PresenceTracker } from './PresenceTracker';
import { RoomBroadcastBus } from './RoomBroadcastBus';
import { SessionRegistry } from './SessionRegistry';

export const MAX_USERNAME_LENGTH = 29;

export type LoginOutcome = 'logged-in' | 'key-required';

export interface LoginProtocolDeps {
  registry: SessionRegistry;
  presence: PresenceTracker;
  bus: RoomBroadcastBus;
  identity: IdentityValidator;
  logger?: LoggerService;
  random?: () => number;
}

export class LoginProtocol {
  private registry: SessionRegistry;
  private presence: PresenceTracker;
  private bus: RoomBroadcastBus;
  private identity: IdentityValidator;
  private logger: LoggerService;
  private random: () => number;

  constructor(deps: LoginProtocolDeps) {
    this.registry = deps.registry;
    this.presence = deps.presence;
    this.bus = deps.bus;
    this.identity = deps.identity;
    this.logger = deps.logger ?? new LoggerService('LoginProtocol');
    this.random = deps.random ?? Math.random;
  }

  async login(connection: ConnectionInfo, request: LoginPayload): Promise<LoginOutcome> {
    const { connectionId } = connection;
    const username = request.username.trim();

    if (this.registry.has(connectionId)) {
      throw new AuthenticationError('Already logged in');
    }
    if (username.length === 0) {
      throw new ValidationError('Username cannot be blank');
    }
    if (nameLength(username) > MAX_USERNAME_LENGTH) {
      throw new ValidationError('Username cannot be that long');
    }

    const room = normalizeRoom(request.streamer);
    if (this.registry.isNameTaken(room, username)) {
      throw new ConflictError('Username is already taken');
    }

    const color = resolveColorOrDefault(request.color, this.random);

    // May yield; the insert below checks uniqueness again.
    const claim = await this.identity.validate(room, username, request.key);

    if (claim.kind === 'key-required') {
      this.bus.emitTo(connectionId, 'login key required', { username: claim.streamer.username });
      return 'key-required';
    }

    const admin = claim.kind === 'admin';
    const session: ChatSession = {
      connectionId,
      address: connection.address,
      room,
      username: admin ? claim.streamer.username : username,
      admin,
      moderator: false,
      muted: false,
      color
    };

    if (this.registry.has(connectionId)) {
      throw new AuthenticationError('Already logged in');
    }
    const stored = this.registry.insert(session);

    this.presence.touch(connectionId, room);
    this.bus.join(connectionId, room);
    this.bus.emitTo(connectionId, 'login success', { username: stored.username });
    this.bus.emit(room, 'connected', {
      ...toRosterEntry(stored),
      users: this.registry.listRoom(room)
    });

    if (admin) {
      this.bus.emitTo(connectionId, 'server', { msg: 'You have admin rights.' });
    }

    this.logger.info(`${stored.username} joined ${room}`, {
      connectionId,
      address: connection.address,
      admin
    });
    return 'logged-in';
  }
}
