import {
  ChatSession,
  hasModeratorPermission,
  nameLength,
  toHtmlColor,
  toRosterEntry
} from '../models/ChatSession';
import {
  AuthenticationError,
  AuthorizationError,
  ValidationError
} from '../errors/ChatErrors';
import { resolveColor } from './ColorResolver';
import { LoggerService } from './LoggerService';
import { MAX_USERNAME_LENGTH } from './LoginProtocol';
import { PresenceTracker } from './PresenceTracker';
import { RoomBroadcastBus } from './RoomBroadcastBus';
import { SessionRegistry } from './SessionRegistry';
import { SettingsStore } from './SettingsStore';
import { TextTransform } from './TextTransform';

export enum Privilege {
  ANY = 'any',
  MODERATOR = 'moderator',
  ADMIN = 'admin'
}

export interface CommandContext {
  session: ChatSession;
  command: string;
  argument: string;
}

export interface CommandDescriptor {
  privilege: Privilege;
  muteGated: boolean;
  run(ctx: CommandContext): void | Promise<void>;
}

export interface CommandLine {
  command: string;
  argument: string;
}

export const MUTED_NOTICE = 'You are muted!';

export function unrecognizedCommand(command: string): string {
  return `Unrecognized command '${command}', use '/help' for info.`;
}

/**
 * Splits `/cmd rest of line` into its command token and argument. Returns
 * null for plain speech.
 */
export function parseCommandLine(line: string): CommandLine | null {
  if (!line.startsWith('/')) {
    return null;
  }
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(line);
  if (!match) {
    return null;
  }
  return { command: match[1], argument: match[2] ?? '' };
}

export function hasPrivilege(session: ChatSession, privilege: Privilege): boolean {
  switch (privilege) {
    case Privilege.ADMIN:
      return session.admin;
    case Privilege.MODERATOR:
      return hasModeratorPermission(session);
    default:
      return true;
  }
}

interface FlagToggle {
  field: 'muted' | 'moderator';
  value: boolean;
  changed: (name: string) => string;
  unchanged: (name: string) => string;
  targetNotice: string;
}

export interface CommandInterpreterDeps {
  registry: SessionRegistry;
  presence: PresenceTracker;
  bus: RoomBroadcastBus;
  store: SettingsStore;
  transform: TextTransform;
  logger?: LoggerService;
  random?: () => number;
}

export class CommandInterpreter {
  private registry: SessionRegistry;
  private presence: PresenceTracker;
  private bus: RoomBroadcastBus;
  private store: SettingsStore;
  private transform: TextTransform;
  private logger: LoggerService;
  private random: () => number;
  private commands: Map<string, CommandDescriptor> = new Map();
  private speech: CommandDescriptor;

  constructor(deps: CommandInterpreterDeps) {
    this.registry = deps.registry;
    this.presence = deps.presence;
    this.bus = deps.bus;
    this.store = deps.store;
    this.transform = deps.transform;
    this.logger = deps.logger ?? new LoggerService('CommandInterpreter');
    this.random = deps.random ?? Math.random;

    this.speech = {
      privilege: Privilege.ANY,
      muteGated: true,
      run: ({ session, argument }) => this.say(session, 'message received', argument)
    };
    this.registerCommands();
  }

  async interpret(connectionId: string, text: string): Promise<void> {
    if (text.length === 0) {
      throw new ValidationError('Message cannot be blank', 'warning');
    }

    const session = this.registry.get(connectionId);
    if (!session) {
      throw new AuthenticationError('User is not authenticated');
    }
    this.presence.touch(connectionId, session.room);

    const line = text.trim();
    if (line.length === 0) {
      throw new ValidationError('Message cannot be blank', 'warning');
    }

    const parsed = parseCommandLine(line);
    const descriptor = parsed ? this.commands.get(parsed.command) : this.speech;
    const context: CommandContext = parsed
      ? { session, ...parsed }
      : { session, command: '', argument: line };

    // Privileged commands are indistinguishable from unknown ones to
    // anyone who may not run them.
    if (!descriptor || !hasPrivilege(session, descriptor.privilege)) {
      throw new AuthorizationError(unrecognizedCommand(context.command));
    }
    if (descriptor.muteGated && session.muted) {
      throw new AuthorizationError(MUTED_NOTICE);
    }

    await descriptor.run(context);
  }

  private register(names: string[], descriptor: CommandDescriptor): void {
    for (const name of names) {
      this.commands.set(name, descriptor);
    }
  }

  private registerCommands(): void {
    this.register(['/say'], this.speech);

    this.register(['/me', '/action', '/describe'], {
      privilege: Privilege.ANY,
      muteGated: true,
      run: ({ session, argument }) => this.say(session, 'action received', argument)
    });

    this.register(['/color', '/setcolor'], {
      privilege: Privilege.ANY,
      muteGated: true,
      run: (ctx) => this.recolor(ctx)
    });

    this.register(['/name', '/nick'], {
      privilege: Privilege.ANY,
      muteGated: true,
      run: (ctx) => this.rename(ctx)
    });

    this.register(['/help'], {
      privilege: Privilege.ANY,
      muteGated: false,
      run: ({ session }) => this.help(session)
    });

    this.register(['/users'], {
      privilege: Privilege.ANY,
      muteGated: false,
      run: ({ session }) => {
        this.bus.emitTo(session.connectionId, 'userlist', { users: this.registry.listRoom(session.room) });
      }
    });

    this.register(['/settings'], {
      privilege: Privilege.ADMIN,
      muteGated: false,
      run: ({ session }) => this.showSettings(session)
    });

    this.register(['/mute', '/quiet'], {
      privilege: Privilege.MODERATOR,
      muteGated: false,
      run: (ctx) => this.toggle(ctx, {
        field: 'muted',
        value: true,
        changed: (name) => `User '${name}' has been muted.`,
        unchanged: (name) => `User '${name}' is already muted.`,
        targetNotice: 'You have been muted.'
      })
    });

    this.register(['/unmute', '/unquiet'], {
      privilege: Privilege.MODERATOR,
      muteGated: false,
      run: (ctx) => this.toggle(ctx, {
        field: 'muted',
        value: false,
        changed: (name) => `User '${name}' has been unmuted.`,
        unchanged: (name) => `User '${name}' is not muted.`,
        targetNotice: 'You have been unmuted.'
      })
    });

    this.register(['/mod'], {
      privilege: Privilege.ADMIN,
      muteGated: false,
      run: (ctx) => this.toggle(ctx, {
        field: 'moderator',
        value: true,
        changed: (name) => `User '${name}' has been promoted to moderator.`,
        unchanged: (name) => `User '${name}' is already a moderator.`,
        targetNotice: 'You have been promoted to moderator.'
      })
    });

    this.register(['/demod', '/unmod'], {
      privilege: Privilege.ADMIN,
      muteGated: false,
      run: (ctx) => this.toggle(ctx, {
        field: 'moderator',
        value: false,
        changed: (name) => `User '${name}' has been demoted from moderator.`,
        unchanged: (name) => `User '${name}' is not a moderator.`,
        targetNotice: 'You have been demoted from moderator.'
      })
    });

    this.register(['/desc', '/description'], {
      privilege: Privilege.ADMIN,
      muteGated: false,
      run: (ctx) => this.updateDescription(ctx)
    });

    this.register(['/password'], {
      privilege: Privilege.ADMIN,
      muteGated: false,
      run: (ctx) => this.updatePassword(ctx)
    });
  }

  private notify(connectionId: string, msg: string): void {
    this.bus.emitTo(connectionId, 'server', { msg });
  }

  private say(session: ChatSession, event: 'message received' | 'action received', text: string): void {
    this.bus.emit(session.room, event, {
      ...toRosterEntry(session),
      message: this.transform(text)
    });
  }

  private recolor({ session, argument }: CommandContext): void {
    const color = this.tryResolveColor(argument);
    if (color === undefined) {
      this.notify(
        session.connectionId,
        `Invalid color ${argument} specified, try a color name, an HTML color like #ff00ff or "random" for a random color.`
      );
      return;
    }

    const updated = this.registry.mutate(session.connectionId, () => ({ color }));
    this.bus.emit(updated.room, 'action received', {
      ...toRosterEntry(updated),
      message: 'changed their color!'
    });
    this.bus.emitTo(updated.connectionId, 'return color', { color: toHtmlColor(updated.color) });
  }

  private tryResolveColor(token: string): number | undefined {
    try {
      return resolveColor(token, this.random);
    } catch (error) {
      if (error instanceof ValidationError) return undefined;
      throw error;
    }
  }

  private rename({ session, argument }: CommandContext): void {
    const name = argument.trim();

    if (nameLength(name) > MAX_USERNAME_LENGTH) {
      this.notify(session.connectionId, 'Too long of a name specified, try a different name.');
      return;
    }
    if (!name) {
      this.notify(session.connectionId, 'Invalid name specified, try a different name.');
      return;
    }
    // The admin flag is tied to holding the streamer's name.
    if (session.admin) {
      this.notify(session.connectionId, "The streamer's name cannot be changed.");
      return;
    }
    if (name.toLowerCase() === session.room || this.registry.isNameTaken(session.room, name)) {
      this.notify(session.connectionId, 'Name has already been taken, try a different name.');
      return;
    }

    const { oldName, session: renamed } = this.registry.rename(session.connectionId, name);
    this.bus.emit(renamed.room, 'rename', {
      oldname: oldName,
      newname: renamed.username,
      type: toRosterEntry(renamed).type,
      color: toHtmlColor(renamed.color),
      users: this.registry.listRoom(renamed.room)
    });
    this.logger.debug(`${oldName} is now ${renamed.username}`, { room: renamed.room });
  }

  private help(session: ChatSession): void {
    const lines = [
      'The following commands are recognized:',
      '/help - show this message',
      '/users - show the currently chatting users',
      '/me - perform an action',
      '/color - set the color of your name in chat',
      '/name - change your name to a new one'
    ];
    if (session.admin) {
      lines.push('/settings - display all stream settings');
      lines.push('/description <text> - set the stream description');
      lines.push('/password [<text>] - set or unset the stream password');
      lines.push('/mod <user> - grant moderator privileges to user');
      lines.push('/demod <user> - revoke moderator privileges from user');
    }
    if (hasModeratorPermission(session)) {
      lines.push('/mute <user> - mute user');
      lines.push('/unmute <user> - unmute user');
    }

    for (const line of lines) {
      this.notify(session.connectionId, line);
    }
  }

  private async showSettings(session: ChatSession): Promise<void> {
    const streamer = await this.store.lookupStreamer(session.room);
    if (!streamer) {
      this.notify(session.connectionId, 'Error looking up settings!');
      return;
    }

    this.notify(session.connectionId, `Description: ${streamer.description ?? ''}`);
    this.notify(session.connectionId, streamer.password ? 'Stream password is set.' : 'No stream password');
  }

  private toggle({ session, argument }: CommandContext, toggle: FlagToggle): void {
    const wanted = argument.trim().toLowerCase();
    const target = this.registry.findByName(session.room, wanted);
    if (!target) {
      this.notify(session.connectionId, `Unrecognized user '${wanted}'`);
      return;
    }

    // Lookup, check and write happen in one synchronous step.
    if (target[toggle.field] === toggle.value) {
      this.notify(session.connectionId, toggle.unchanged(target.username));
      return;
    }

    this.registry.mutate(target.connectionId, () =>
      toggle.field === 'muted' ? { muted: toggle.value } : { moderator: toggle.value }
    );
    this.notify(session.connectionId, toggle.changed(target.username));
    this.notify(target.connectionId, toggle.targetNotice);
    this.logger.info(`Moderation: ${toggle.field}=${toggle.value} on ${target.username} by ${session.username}`, {
      room: session.room
    });
  }

  private async updateDescription({ session, argument }: CommandContext): Promise<void> {
    const description = this.transform(argument.trim());
    await this.store.updateDescription(session.room, description);
    this.notify(session.connectionId, 'Stream description updated!');
  }

  private async updatePassword({ session, argument }: CommandContext): Promise<void> {
    const password = argument.trim();

    if (password) {
      await this.store.updatePassword(session.room, password);
      this.notify(session.connectionId, `Stream password set to "${password}"!`);
      this.bus.emitTo(session.connectionId, 'password set', { password });
      this.bus.emit(session.room, 'password activated', { username: session.room });
    } else {
      await this.store.updatePassword(session.room, null);
      this.notify(session.connectionId, 'Stream password removed!');
      this.bus.emit(session.room, 'password deactivated', {
        username: session.room,
        msg: 'Stream password has been removed.'
      });
    }
    this.logger.info(`Stream password ${password ? 'set' : 'removed'}`, { room: session.room });
  }
}
