import type { GatewayContext } from '../context/default.js';
import type { Command, Packet } from '../types/wire.js';
import type { Transport } from './Transport.js';
import type {
  DispatchSink,
  MessageSubscriber,
  MessageTransportEvents,
  MessageTransportExtra,
  MessageTransportOptions,
  TransportState,
} from './types.js';

import { NotSupportedError, TooManyProtocolsError, TransportClosedError } from '../errors.js';
import { PriorityQueue } from '../pipe/PriorityQueue.js';
import { TypedEventEmitter } from '../pipe/TypedEventEmitter.js';
import { Message } from '../types/message.js';
import { dlog } from '../utils/debug.js';
import { Signal } from '../utils/signal.js';

/** A transport fans inbound messages out to at most this many protocols. */
export const MAX_PROTOCOLS = 2;

/**
 * MessageTransport is the message-layer transport: it sits between the
 * message protocols above and a packet-layer sender below.
 *
 * It manages:
 * - **Outbound queue** ordered by `(priority, arrival)`, drained by a single
 *   dispatcher loop with one command in flight at a time
 * - **Inbound fan-out** of every decoded packet, as a {@link Message}, to up
 *   to {@link MAX_PROTOCOLS} subscribed protocols, after reply callbacks ran
 * - **Lifecycle** `open → closing → closed`, ending with exactly one
 *   `connectionLost()` per subscribed protocol
 *
 * @template C - Outbound command type.
 * @template P - Inbound packet type.
 */
export class MessageTransport<C extends Command = Command, P extends Packet = Packet>
  extends TypedEventEmitter<MessageTransportEvents<C>>
  implements Transport<C, MessageTransportExtra> {
  private readonly queue = new PriorityQueue<C>();
  private readonly protocols: MessageSubscriber<C, P>[] = [];
  private state: TransportState = 'open';

  private dispatcher?: DispatchSink<C>;
  private writerTask?: Promise<void>;
  private inFlight = false;
  private lost = false;

  private readonly wake = new Signal();
  private readonly idle = new Signal();

  private readonly highWaterMark?: number;
  private readonly lowWaterMark: number;
  private writingPaused = false;

  /**
   * @param gwy - The owning gateway; its callback registry sees every inbound message.
   * @param protocol - Optional first subscriber, attached immediately.
   * @param options - Optional queue watermarks for write flow control.
   */
  constructor(
    private readonly gwy: GatewayContext<C, P>,
    protocol?: MessageSubscriber<C, P>,
    options: MessageTransportOptions = {},
  ) {
    super();
    this.highWaterMark = options.highWaterMark;
    this.lowWaterMark = options.lowWaterMark ?? Math.floor((options.highWaterMark ?? 0) / 2);
    if (protocol) this.setProtocol(protocol);
  }

  /**
   * Queues a command for dispatch.
   *
   * @remarks
   * Until a dispatcher is attached there is nothing to drain the queue, so
   * commands written before {@link setDispatcher} are dropped, not kept.
   *
   * @throws {@link TransportClosedError} once `close()` or `abort()` was called.
   */
  public write(cmd: C): void {
    if (this.state !== 'open') throw new TransportClosedError();

    if (!this.dispatcher) {
      dlog('ramses:transport', `no dispatcher, dropped: ${String(cmd)}`);
      return;
    }

    dlog('ramses:transport', `write(${String(cmd)})`);
    this.queue.push(cmd);
    this.wake.notify();
    this.checkHighWater();
  }

  public writeMany(cmds: Iterable<C>): void {
    for (const cmd of cmds) this.write(cmd);
  }

  /**
   * Installs the lower-layer sink. The first call starts the dispatcher
   * loop; later calls only swap the sink it sends through.
   */
  public setDispatcher(sink: DispatchSink<C>): void {
    dlog('ramses:transport', 'setDispatcher()');
    this.dispatcher = sink;
    if (!this.writerTask) this.writerTask = this.pktDispatcher();
  }

  /**
   * Subscribes a protocol to inbound messages and calls its `connectionMade`.
   * Subscribing the same instance twice is a no-op.
   *
   * @throws {@link TooManyProtocolsError} for a third distinct protocol.
   */
  public setProtocol(protocol: MessageSubscriber<C, P>): void {
    if (this.protocols.includes(protocol)) return;
    if (this.protocols.length >= MAX_PROTOCOLS) throw new TooManyProtocolsError(MAX_PROTOCOLS);

    dlog('ramses:transport', `setProtocol(#${this.protocols.length + 1})`);
    this.protocols.push(protocol);
    protocol.connectionMade(this);
  }

  public getProtocol(): readonly MessageSubscriber<C, P>[] {
    return this.protocols;
  }

  /**
   * Inbound entry point handed to the packet layer: wraps the packet, lets the
   * callback registry see it, then delivers it to each protocol in turn.
   */
  public readonly pktReceiver = (pkt: P): void => {
    if (this.lost) {
      dlog('ramses:transport', `closed, ignored: ${String(pkt)}`);
      return;
    }

    dlog('ramses:transport', `pktReceiver(${String(pkt)})`);
    const msg = new Message(pkt);
    this.gwy.callbacks.onMessageArrival(msg);
    for (const protocol of this.protocols) protocol.dataReceived(msg);
  };

  /**
   * Stops accepting writes; queued commands are still dispatched, then every
   * protocol is told the connection is lost.
   */
  public close(): void {
    dlog('ramses:transport', 'close()');
    if (this.state === 'open') this.state = 'closing';
    this.finish();
  }

  /**
   * Closes at once and discards every queued command. A command already
   * handed to the sink is not recalled. Writers held back by the high-water
   * mark are released, so their writes fail instead of waiting forever.
   */
  public abort(): void {
    dlog('ramses:transport', `abort(): discarding ${this.queue.length} queued`);
    this.state = 'closed';
    this.queue.kill();
    this.releaseWriters();
    this.idle.notify();
    this.finish();
  }

  public isClosing(): boolean {
    return this.state !== 'open';
  }

  public getState(): TransportState {
    return this.state;
  }

  /** Number of commands waiting to be dispatched. */
  public get size(): number {
    return this.queue.length;
  }

  public getExtraInfo<K extends keyof MessageTransportExtra>(name: K): MessageTransportExtra[K] | undefined {
    const extra: Partial<MessageTransportExtra> = { writerTask: this.writerTask };
    return extra[name];
  }

  /**
   * Resolves once the queue is empty and no command is in flight.
   */
  public async join(): Promise<void> {
    while (this.queue.length > 0 || this.inFlight) await this.idle.wait();
  }

  public isReading(): boolean {
    throw new NotSupportedError('isReading');
  }

  public pauseReading(): void {
    throw new NotSupportedError('pauseReading');
  }

  public resumeReading(): void {
    throw new NotSupportedError('resumeReading');
  }

  public setWriteBufferLimits(_high?: number, _low?: number): void {
    throw new NotSupportedError('setWriteBufferLimits');
  }

  public getWriteBufferSize(): number {
    throw new NotSupportedError('getWriteBufferSize');
  }

  public writeEof(): void {
    throw new NotSupportedError('writeEof');
  }

  public canWriteEof(): boolean {
    return false;
  }

  /**
   * The dispatcher loop. Runs until the queue is empty and the transport is
   * no longer open, waiting on {@link wake} rather than polling.
   *
   * @internal
   */
  private async pktDispatcher(): Promise<void> {
    for (;;) {
      const cmd = this.queue.shift();
      if (cmd === undefined) {
        if (this.state !== 'open') break;
        await this.wake.wait();
        continue;
      }

      this.checkLowWater();
      this.inFlight = true;
      let failure: Error | undefined;
      try {
        dlog('ramses:transport', `pktDispatcher(${String(cmd)})`);
        await this.dispatcher?.(cmd);
      } catch (err) {
        failure = err instanceof Error ? err : new Error(String(err));
      } finally {
        this.inFlight = false;
      }

      if (failure) {
        console.warn(`[MessageTransport] dispatch of ${String(cmd)} failed:`, failure.message);
        this.emit('dispatchFailed', cmd, failure);
      } else {
        this.emit('dispatched', cmd);
      }
      this.idle.notify();
    }

    dlog('ramses:transport', 'pktDispatcher(): connectionLost()');
    this.connectionLost();
  }

  /**
   * Wakes the dispatcher so it can notice the state change; with no loop
   * running, notifies the protocols directly.
   *
   * @internal
   */
  private finish() {
    this.wake.notify();
    if (!this.writerTask) this.connectionLost();
  }

  private connectionLost() {
    if (this.lost) return;
    this.lost = true;
    this.state = 'closed';
    this.releaseWriters();

    for (const protocol of this.protocols) {
      try {
        protocol.connectionLost();
      } catch (err) {
        console.warn('[MessageTransport] connectionLost handler failed:', err);
      }
    }
    this.emit('closed');
    this.idle.notify();
  }

  private checkHighWater() {
    if (this.highWaterMark === undefined || this.writingPaused) return;
    if (this.queue.length < this.highWaterMark) return;

    dlog('ramses:transport', `queue at high-water mark (${this.queue.length})`);
    this.writingPaused = true;
    for (const protocol of this.protocols) protocol.pauseWriting();
  }

  private checkLowWater() {
    if (!this.writingPaused || this.queue.length > this.lowWaterMark) return;

    dlog('ramses:transport', `queue at low-water mark (${this.queue.length})`);
    this.releaseWriters();
  }

  private releaseWriters() {
    if (!this.writingPaused) return;
    this.writingPaused = false;
    for (const protocol of this.protocols) protocol.resumeWriting();
  }
}
