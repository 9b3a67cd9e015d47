export { MessageTransport, MAX_PROTOCOLS } from './MessageTransport.js';
export type { Transport } from './Transport.js';
export type {
  DispatchSink,
  MessageSubscriber,
  MessageTransportEvents,
  MessageTransportExtra,
  MessageTransportOptions,
  TransportState,
} from './types.js';
