export type CommandErrorKind = 'format' | 'not-found' | 'cancelled';

/** Operator-facing console failure. Raised only after the message was posted to the console. */
export class CommandError extends Error {
  readonly kind: CommandErrorKind;

  constructor(kind: CommandErrorKind, message: string) {
    super(message);
    this.name = 'CommandError';
    this.kind = kind;
  }
}

export function isCommandError(err: unknown): err is CommandError {
  return err instanceof CommandError;
}
