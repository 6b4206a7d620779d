/**
 * Private notice channel an error is reported on. Clients render `error`
 * and `warning` as alerts and `server` as an inline chat line.
 */
export type NoticeChannel = 'error' | 'warning' | 'server';

export type ChatErrorType =
  | 'ValidationError'
  | 'AuthenticationError'
  | 'AuthorizationError'
  | 'ConflictError'
  | 'NotFoundError';

export abstract class ChatError extends Error {
  abstract readonly type: ChatErrorType;
  readonly channel: NoticeChannel;

  constructor(message: string, channel: NoticeChannel = 'error') {
    super(message);
    this.name = new.target.name;
    this.channel = channel;
  }
}

export class ValidationError extends ChatError {
  readonly type = 'ValidationError';
}

export class AuthenticationError extends ChatError {
  readonly type = 'AuthenticationError';
}

// Always reported on `server`: muted notices and the generic
// unrecognized-command text both appear inline in chat.
export class AuthorizationError extends ChatError {
  readonly type = 'AuthorizationError';

  constructor(message: string) {
    super(message, 'server');
  }
}

export class ConflictError extends ChatError {
  readonly type = 'ConflictError';
}

export class NotFoundError extends ChatError {
  readonly type = 'NotFoundError';
}

export function isChatError(error: unknown): error is ChatError {
  return error instanceof ChatError;
}
