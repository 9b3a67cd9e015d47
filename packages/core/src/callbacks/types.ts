import type { Header, Packet } from '../types/wire.js';
import type { Message } from '../types/message.js';

/**
 * What a correlation callback is told when it fires.
 *
 * - `expired: true` → the deadline passed with no matching reply
 * - `expired: false` → `msg` carries the matching reply
 */
export type CallbackOutcome<P extends Packet = Packet> =
  | { expired: true; header: Header }
  | { expired: false; header: Header; msg: Message<P> };

export type CallbackFn<A extends unknown[] = [], P extends Packet = Packet> = (
  outcome: CallbackOutcome<P>,
  ...args: A
) => void;

/**
 * Registration options for {@link CallbackRegistry.register}.
 */
export interface CallbackOptions {
  /**
   * Daemon entries fire on every matching message and are never removed
   * or expired by the registry.
   *
   * @default false
   */
  daemon?: boolean;

  /**
   * Epoch milliseconds after which a non-daemon entry is considered expired.
   * Omitted → never expires.
   */
  deadline?: number;
}
