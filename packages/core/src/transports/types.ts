import type { Protocol } from '../protocols/Protocol.js';
import type { Message } from '../types/message.js';
import type { Command, Packet } from '../types/wire.js';
import type { MessageTransport } from './MessageTransport.js';

export type TransportState = 'open' | 'closing' | 'closed';

/**
 * The lower-layer send function the dispatcher loop drains into.
 * The loop waits for the returned promise before sending the next command.
 */
export type DispatchSink<C extends Command = Command> = (cmd: C) => Promise<void>;

/**
 * A protocol that can subscribe to a {@link MessageTransport}.
 */
export type MessageSubscriber<C extends Command = Command, P extends Packet = Packet> =
  Protocol<MessageTransport<C, P>, Message<P>>;

export interface MessageTransportOptions {
  /**
   * Queue length at which subscribed protocols are told to `pauseWriting()`.
   * Omitted → the queue is unbounded and protocols are never paused.
   */
  highWaterMark?: number;

  /**
   * Queue length at or below which paused protocols are told to
   * `resumeWriting()`.
   *
   * @default Math.floor(highWaterMark / 2)
   */
  lowWaterMark?: number;
}

/**
 * Values available through {@link MessageTransport.getExtraInfo}.
 */
export interface MessageTransportExtra {
  /** Settles once the dispatcher loop has ended and protocols were notified. */
  writerTask: Promise<void>;
}

/**
 * Event definitions for {@link MessageTransport}.
 */
export interface MessageTransportEvents<C extends Command = Command> {
  /** A command was handed to the sink and the sink resolved. */
  dispatched: (cmd: C) => void;

  /** The sink rejected; the loop carries on with the next command. */
  dispatchFailed: (cmd: C, error: Error) => void;

  /** Connection-lost was delivered to the subscribed protocols. */
  closed: () => void;
}
