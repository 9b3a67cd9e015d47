import type { CallbackRegistry } from '../callbacks/CallbackRegistry.js';
import type { MessageTransport } from '../transports/MessageTransport.js';
import type { Command, Packet } from '../types/wire.js';

/**
 * The gateway as seen from inside the stack. It is created at gateway
 * startup and passed to every transport and protocol; nothing in the stack
 * reaches for a global.
 */
export interface GatewayContext<C extends Command = Command, P extends Packet = Packet> {
  /** Reply correlation table, fed by the message transport's inbound path. */
  readonly callbacks: CallbackRegistry<P>;

  /** The shared message-layer transport, once the message stack exists. */
  readonly msgTransport?: MessageTransport<C, P>;

  /**
   * Ends the gateway's run. Called by the message protocol once its
   * transport has lost the connection; `exc` is informational.
   */
  stop(exc?: Error): void;
}
