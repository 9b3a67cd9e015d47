import type { Prioritized } from '../pipe/PriorityQueue.js';

/**
 * Correlation key shared by a command and its reply,
 * e.g. `"3220|RQ|01:123456|00"`.
 */
export type Header = string;

/**
 * An outbound unit as far as the transport is concerned: something with a
 * priority (lower is sent first) and a header. Framing belongs to the
 * packet layer.
 */
export interface Command extends Prioritized {
  readonly header: Header;
}

/**
 * A decoded, valid inbound unit handed up by the packet layer.
 */
export interface Packet {
  readonly header: Header;
  readonly dtm: Date;
}
