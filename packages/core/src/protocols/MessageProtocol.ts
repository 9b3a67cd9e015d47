import type { GatewayContext } from '../context/default.js';
import type { MessageTransport } from '../transports/MessageTransport.js';
import type { Message } from '../types/message.js';
import type { Command, Packet } from '../types/wire.js';
import type { PacketSender, Protocol } from './Protocol.js';

import { type queueAsPromised, promise as fastqPromise } from 'fastq';
import { GracefulExit, TransportClosedError } from '../errors.js';
import { dlog } from '../utils/debug.js';
import { Signal } from '../utils/signal.js';

/**
 * User callback for every inbound message. May be async; calls are
 * serialized in arrival order.
 */
export type MessageHandler<P extends Packet = Packet> = (msg: Message<P>) => void | Promise<void>;

/**
 * Builds a message-layer protocol around a handler (see `createClient`).
 */
export type ProtocolFactory<C extends Command = Command, P extends Packet = Packet> = (
  msgHandler: MessageHandler<P>,
) => MessageProtocol<C, P>;

/**
 * The message-layer protocol: hands inbound messages to the application and
 * pushes outbound commands into its {@link MessageTransport}, holding them
 * back while the transport has paused writing.
 *
 * @template C - Outbound command type.
 * @template P - Inbound packet type.
 */
export class MessageProtocol<C extends Command = Command, P extends Packet = Packet>
  implements Protocol<MessageTransport<C, P>, Message<P>>, PacketSender<C> {
  protected transport?: MessageTransport<C, P>;
  protected readonly queue: queueAsPromised<Message<P>>;

  private paused = false;
  private readonly resumed = new Signal();

  /**
   * @param msgHandler - Receives every inbound message.
   * @param gwy - The owning gateway, stopped when the connection is lost.
   */
  constructor(
    private readonly msgHandler: MessageHandler<P>,
    protected readonly gwy: GatewayContext<C, P>,
  ) {
    this.queue = fastqPromise(this, this.process.bind(this), 1);
  }

  public connectionMade(transport: MessageTransport<C, P>): void {
    dlog('ramses:protocol', 'connectionMade()');
    this.transport = transport;
  }

  public dataReceived(msg: Message<P>): void {
    dlog('ramses:protocol', `dataReceived(${msg.header})`);
    this.queue.push(msg).catch((err: unknown) => this.onHandlerError(err));
  }

  /**
   * Writes `cmd` to the transport, first waiting out any `pauseWriting()`.
   * Nothing is dropped here; a pause only delays the write.
   *
   * @throws {@link TransportClosedError} with no transport, or once it is closing.
   */
  public async sendData(cmd: C): Promise<void> {
    dlog('ramses:protocol', `sendData(${String(cmd)})`);
    while (this.paused) await this.resumed.wait();

    if (!this.transport) throw new TransportClosedError('protocol is not connected to a transport');
    this.transport.write(cmd);
  }

  /**
   * Ends the gateway's run once every message already received has been
   * handled; `exc` is passed along for logging only.
   */
  public connectionLost(exc?: Error): void {
    dlog('ramses:protocol', 'connectionLost()', exc?.message ?? '');
    if (this.queue.idle()) {
      this.gwy.stop(exc);
      return;
    }
    void this.queue.drained().then(() => this.gwy.stop(exc));
  }

  public pauseWriting(): void {
    dlog('ramses:protocol', 'pauseWriting()');
    this.paused = true;
  }

  public resumeWriting(): void {
    dlog('ramses:protocol', 'resumeWriting()');
    this.paused = false;
    this.resumed.notify();
  }

  public get isWritingPaused(): boolean {
    return this.paused;
  }

  /**
   * Resolves once every message received so far has been handled.
   */
  public drained(): Promise<void> {
    return this.queue.drained();
  }

  private async process(msg: Message<P>): Promise<void> {
    await this.msgHandler(msg);
  }

  private onHandlerError(err: unknown) {
    if (err instanceof GracefulExit) {
      dlog('ramses:protocol', 'handler requested a graceful exit');
      this.transport?.close();
      return;
    }
    console.warn('[MessageProtocol] message handler failed:', err);
  }
}
