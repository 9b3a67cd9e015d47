export { CallbackRegistry } from './callbacks/index.js';
export type { CallbackFn, CallbackOptions, CallbackOutcome } from './callbacks/index.js';
export type { GatewayContext } from './context/default.js';
export { GracefulExit, NotSupportedError, RamsesError, TooManyProtocolsError, TransportClosedError } from './errors.js';
export { PriorityQueue } from './pipe/PriorityQueue.js';
export type { Prioritized } from './pipe/PriorityQueue.js';
export { TypedEventEmitter } from './pipe/TypedEventEmitter.js';
export { MessageProtocol } from './protocols/index.js';
export type { MessageHandler, PacketHandler, PacketSender, Protocol, ProtocolFactory } from './protocols/index.js';
export { createClient, createMessageStack } from './stack.js';
export { MessageTransport, MAX_PROTOCOLS } from './transports/index.js';
export type {
  DispatchSink,
  MessageSubscriber,
  MessageTransportEvents,
  MessageTransportExtra,
  MessageTransportOptions,
  Transport,
  TransportState,
} from './transports/index.js';
export { Message } from './types/index.js';
export type { Command, Header, Packet } from './types/index.js';
export { dlog } from './utils/debug.js';
export { Signal } from './utils/signal.js';
