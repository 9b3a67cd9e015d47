import type { CallbackFn, Message, MessageHandler } from '@ramses-link/core';
import type { Packet } from './Packet.js';
import type { PortOpener } from './stack.js';

/**
 * How a gateway run ended without a fault.
 *
 * - `'graceful'` → `shutdown()` or a handler threw `GracefulExit`
 * - `'interrupted'` → `interrupt()`, e.g. on SIGINT
 * - `'eof'` → the serial link closed underneath us
 */
export type ExitReason = 'graceful' | 'interrupted' | 'eof';

/**
 * Configuration options for {@link Gateway}.
 */
export interface GatewayOptions {
  /** Serial device path, e.g. `/dev/ttyUSB0`. */
  serialPort: string;

  /** Receives every inbound message after reply callbacks have run. */
  msgHandler?: MessageHandler<Packet>;

  /**
   * Reply deadline applied by `send()` when a callback is given.
   *
   * @default 3000
   */
  replyTimeoutMs?: number;

  /**
   * Outbound queue length at which the message protocol pauses writing.
   * Omitted → unbounded.
   */
  highWaterMark?: number;

  /** Replaces the `serialport` opener, e.g. with a mock binding in tests. */
  openPort?: PortOpener;
}

export interface SendOptions {
  /** Fired with the reply, or with an expired outcome after the deadline. */
  callback?: CallbackFn<[], Packet>;

  /** Overrides {@link GatewayOptions.replyTimeoutMs} for this command. */
  timeoutMs?: number;

  /** Keep the callback for every matching message; it never expires. */
  daemon?: boolean;
}

/**
 * Event definitions for {@link Gateway}.
 */
export interface GatewayEvents {
  /** Every inbound message, before the configured handler sees it. */
  message: (msg: Message<Packet>) => void;

  /** The run ended without a fault. */
  stopped: (reason: ExitReason) => void;
}
