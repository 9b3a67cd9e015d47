import type { Header, Packet as CorePacket } from '@ramses-link/core';
import type { Verb } from './constants.js';

import { NON_DEVICE_ID } from './constants.js';
import { isRequest, makeHeader } from './header.js';

const ADDR = '(\\d{2}:\\d{6}|--:------)';
const FRAME = new RegExp(
  `^(\\d{3}|---) ( I|RQ|RP| W) (\\d{3}|---) ${ADDR} ${ADDR} ${ADDR} ([0-9A-F]{4}) (\\d{3}) ([0-9A-F]*)$`,
);

/**
 * One frame as printed by the gateway, e.g.
 * `045  I --- 01:145038 --:------ 01:145038 1F09 003 FF04B5`.
 */
export class Packet implements CorePacket {
  public readonly header: Header;

  private constructor(
    public readonly line: string,
    public readonly dtm: Date,
    public readonly rssi: string,
    public readonly verb: Verb,
    public readonly seqn: string,
    public readonly addrs: readonly [string, string, string],
    public readonly code: string,
    public readonly payload: string,
  ) {
    const device = isRequest(verb) ? this.dst : this.src;
    this.header = makeHeader(code, verb, device, payload);
  }

  /**
   * Parses a gateway line. Returns `undefined` for anything that is not a
   * well-formed frame, including a payload that disagrees with its length.
   */
  public static parse(line: string, dtm: Date = new Date()): Packet | undefined {
    const m = FRAME.exec(line.trim());
    if (!m) return undefined;

    const [, rssi, verb, seqn, addr0, addr1, addr2, code, len, payload] = m;
    if (!isVerb(verb)) return undefined;
    if (Number(len) * 2 !== payload.length || payload.length === 0) return undefined;
    if (addr0 === NON_DEVICE_ID) return undefined;

    return new Packet(line.trim(), dtm, rssi, verb, seqn, [addr0, addr1, addr2], code, payload);
  }

  public get src(): string {
    return this.addrs[0];
  }

  /** The addressee, or the announced address of a broadcast. */
  public get dst(): string {
    return this.addrs[1] !== NON_DEVICE_ID ? this.addrs[1] : this.addrs[2];
  }

  public toString(): string {
    return this.line;
  }
}

function isVerb(v: string): v is Verb {
  return v === ' I' || v === 'RQ' || v === 'RP' || v === ' W';
}
