import { RamsesError } from '@ramses-link/core';

/**
 * Raised for a command that cannot be framed for the gateway.
 */
export class InvalidCommandError extends RamsesError {
  constructor(public readonly input: string, reason: string) {
    super(`invalid command "${input}": ${reason}`);
  }
}

/**
 * Rejects {@link Gateway.request} when no reply arrived before the deadline.
 */
export class ReplyTimeoutError extends RamsesError {
  constructor(public readonly header: string) {
    super(`no reply for ${header}`);
  }
}

/**
 * Rejects a pending {@link Gateway.request} when a later request waits for
 * the same reply header.
 */
export class RequestSupersededError extends RamsesError {
  constructor(public readonly header: string) {
    super(`request for ${header} was superseded by a newer one`);
  }
}
