import type { GatewayContext } from './context/default.js';
import type { MessageHandler, ProtocolFactory } from './protocols/MessageProtocol.js';
import type { MessageTransportOptions } from './transports/types.js';
import type { Command, Packet } from './types/wire.js';

import { TransportClosedError } from './errors.js';
import { MessageProtocol } from './protocols/MessageProtocol.js';
import { MessageTransport } from './transports/MessageTransport.js';
import { dlog } from './utils/debug.js';

// The layering is: msg -> pkt -> ser

/**
 * Builds the message-layer pair. The transport has no dispatcher yet, so
 * writes are dropped until a packet stack is attached beneath it.
 */
export function createMessageStack<C extends Command = Command, P extends Packet = Packet>(
  gwy: GatewayContext<C, P>,
  msgHandler: MessageHandler<P>,
  options?: MessageTransportOptions,
): [MessageProtocol<C, P>, MessageTransport<C, P>] {
  const msgProtocol = new MessageProtocol<C, P>(msgHandler, gwy);
  const msgTransport = new MessageTransport<C, P>(gwy, msgProtocol, options);
  return [msgProtocol, msgTransport];
}

/**
 * Attaches a second message-layer protocol to the gateway's shared transport.
 * Its `sendData` feeds the same outbound queue the packet layer drains, and
 * it receives every inbound message after the first protocol.
 *
 * @throws {@link TransportClosedError} when the gateway has no message transport yet.
 * @throws {@link TooManyProtocolsError} when both fan-out slots are taken.
 */
export function createClient<C extends Command = Command, P extends Packet = Packet>(
  gwy: GatewayContext<C, P>,
  protocolFactory: ProtocolFactory<C, P>,
  msgHandler: MessageHandler<P>,
): [MessageProtocol<C, P>, MessageTransport<C, P>] {
  dlog('ramses:transport', 'createClient()');
  const msgTransport = gwy.msgTransport;
  if (!msgTransport) throw new TransportClosedError('gateway has no message transport');

  const msgProtocol = protocolFactory(msgHandler);
  msgTransport.setProtocol(msgProtocol);
  return [msgProtocol, msgTransport];
}
