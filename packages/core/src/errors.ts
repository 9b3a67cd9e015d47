/**
 * Base class for every error raised by the transport/protocol stack.
 */
export class RamsesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised by `write()` once the transport is closing or closed.
 * The transport cannot be reopened; build a new stack instead.
 */
export class TransportClosedError extends RamsesError {
  constructor(message = 'transport is closing or has closed') {
    super(message);
  }
}

/**
 * Raised when a third distinct protocol subscribes to a transport.
 */
export class TooManyProtocolsError extends RamsesError {
  constructor(public readonly limit: number) {
    super(`Exceeded maximum number of subscribing protocols (${limit})`);
  }
}

/**
 * Raised by transport capabilities that are deliberately not implemented
 * (read flow control, write buffer limits, write EOF).
 */
export class NotSupportedError extends RamsesError {
  constructor(public readonly operation: string) {
    super(`${operation}() is not supported by this transport`);
  }
}

/**
 * Thrown by a message handler to ask the gateway to drain and exit.
 */
export class GracefulExit extends RamsesError {
  constructor(message = 'graceful exit requested') {
    super(message);
  }
}
