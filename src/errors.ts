/**
 * Thrown by commands that cannot complete (a motion past the buffer edge, an
 * empty register). The command executor turns it into a dispatch error.
 */
export class CommandFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandFailure";
  }
}

export function fail(reason: string): never {
  throw new CommandFailure(reason);
}

export function getErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  let msg = error.message;
  const seen = new WeakSet<Error>();
  seen.add(error);
  let current: unknown = error.cause;
  while (current instanceof Error) {
    if (seen.has(current)) break;
    seen.add(current);
    if (current.message && !msg.includes(current.message)) {
      msg += ` [cause: ${current.message}]`;
    }
    current = current.cause;
  }
  return msg;
}
