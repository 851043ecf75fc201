/** A request the server understood as bytes but cannot execute. */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }

  static arity(command: string): CommandError {
    return new CommandError(
      `wrong number of arguments for '${command.toLowerCase()}'`
    );
  }
}

/** Malformed framing: a bad length, count or integer line. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** A value with no wire representation. */
export class EncodingError extends CommandError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * The peer closed the stream before the next value started.
 *
 * `partial` counts bytes of an unfinished value that were buffered when the
 * stream ended; they are dropped.
 */
export class Disconnect extends Error {
  constructor(public partial = 0) {
    super(
      partial > 0
        ? `connection closed mid-message (${partial} bytes dropped)`
        : 'connection closed'
    );
    this.name = 'Disconnect';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
