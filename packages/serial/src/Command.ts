import type { Command as CoreCommand, Header } from '@ramses-link/core';
import type { Verb } from './constants.js';

import { DEFAULT_GATEWAY_ID, NON_DEVICE_ID, VERBS } from './constants.js';
import { InvalidCommandError } from './errors.js';
import { makeHeader } from './header.js';

/**
 * Dispatch priorities; lower values leave the queue first.
 */
export const Priority = {
  HIGHEST: 0,
  HIGH: 2,
  DEFAULT: 4,
  LOW: 6,
  LOWEST: 8,
} as const;

export interface CommandInit {
  verb: Verb;
  code: string;
  dest: string;
  payload: string;
  /** @default DEFAULT_GATEWAY_ID */
  src?: string;
  /** @default Priority.DEFAULT */
  priority?: number;
}

const DEVICE_ID = /^\d{2}:\d{6}$/;
const CODE = /^[0-9A-F]{4}$/;
const PAYLOAD = /^([0-9A-F]{2}){1,48}$/;

/**
 * An outbound frame for the gateway.
 */
export class Command implements CoreCommand {
  public readonly verb: Verb;
  public readonly code: string;
  public readonly dest: string;
  public readonly src: string;
  public readonly payload: string;
  public readonly priority: number;

  /** Header of this command, as its echo from the gateway will carry it. */
  public readonly header: Header;

  /** Header the reply to this command will carry. */
  public readonly rxHeader: Header;

  constructor(init: CommandInit) {
    const code = init.code.toUpperCase();
    const payload = init.payload.toUpperCase();
    const src = init.src ?? DEFAULT_GATEWAY_ID;
    const label = `${init.verb} ${init.dest} ${init.code} ${init.payload}`;

    if (!DEVICE_ID.test(init.dest)) throw new InvalidCommandError(label, 'bad destination address');
    if (!DEVICE_ID.test(src)) throw new InvalidCommandError(label, 'bad source address');
    if (!CODE.test(code)) throw new InvalidCommandError(label, 'bad code');
    if (!PAYLOAD.test(payload)) throw new InvalidCommandError(label, 'bad payload');

    this.verb = init.verb;
    this.code = code;
    this.dest = init.dest;
    this.src = src;
    this.payload = payload;
    this.priority = init.priority ?? Priority.DEFAULT;

    this.header = makeHeader(code, this.verb, this.dest, payload);
    this.rxHeader = makeHeader(code, replyVerb(this.verb), this.dest, payload);
  }

  /**
   * Parses the short form `VERB DEST CODE PAYLOAD`, e.g. `RQ 01:123456 1F09 00`.
   * A one-letter `I` or `W` verb is accepted.
   */
  public static fromString(input: string, priority?: number): Command {
    const parts = input.trim().split(/\s+/);
    if (parts.length !== 4) throw new InvalidCommandError(input, 'expected VERB DEST CODE PAYLOAD');

    const [rawVerb, dest, code, payload] = parts;
    const verb = VERBS.find((v) => v.trim() === rawVerb.toUpperCase());
    if (!verb) throw new InvalidCommandError(input, `unknown verb "${rawVerb}"`);

    return new Command({ verb, dest, code, payload, priority });
  }

  /** The frame as written to the gateway, without the line terminator. */
  public toString(): string {
    const len = String(this.payload.length / 2).padStart(3, '0');
    return `${this.verb} --- ${this.src} ${this.dest} ${NON_DEVICE_ID} ${this.code} ${len} ${this.payload}`;
  }
}

function replyVerb(verb: Verb): Verb {
  if (verb === 'RQ') return 'RP';
  if (verb === ' W') return ' I';
  return verb;
}
