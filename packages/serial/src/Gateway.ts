import type {
  CallbackFn,
  GatewayContext,
  Header,
  Message,
  MessageHandler,
  MessageProtocol,
  MessageTransport,
} from '@ramses-link/core';
import type { Command } from './Command.js';
import type { GatewayProtocol, PacketLayerContext } from './GatewayProtocol.js';
import type { Packet } from './Packet.js';
import type { SerialTransport } from './SerialTransport.js';
import type { ExitReason, GatewayEvents, GatewayOptions, SendOptions } from './types.js';

import {
  CallbackRegistry,
  TransportClosedError,
  TypedEventEmitter,
  createMessageStack,
  dlog,
} from '@ramses-link/core';
import { ReplyTimeoutError, RequestSupersededError } from './errors.js';
import { createPacketStack } from './stack.js';

/**
 * Gateway is the context object the whole stack hangs off: it owns the
 * callback registry, builds the message stack over the packet stack, and
 * tracks why and when the run ends.
 *
 * @example
 * const gwy = new Gateway({ serialPort: '/dev/ttyUSB0', msgHandler: (msg) => console.log(`${msg}`) });
 * const running = gwy.start();
 * await gwy.send(Command.fromString('RQ 01:123456 1F09 00'));
 * gwy.shutdown();
 * await running; // 'graceful'
 */
export class Gateway extends TypedEventEmitter<GatewayEvents>
  implements GatewayContext<Command, Packet>, PacketLayerContext {
  public readonly callbacks = new CallbackRegistry<Packet>();

  public msgProtocol?: MessageProtocol<Command, Packet>;
  public msgTransport?: MessageTransport<Command, Packet>;
  public pktProtocol?: GatewayProtocol;
  public pktTransport?: SerialTransport;

  private readonly replyTimeoutMs: number;
  private running?: Promise<ExitReason>;
  private settleRun?: { resolve: (reason: ExitReason) => void; reject: (err: Error) => void };
  private readonly pendingRequests = new Map<Header, (err: Error) => void>();

  private exitReason?: ExitReason;
  private fault?: Error;
  private stopping = false;
  private linkDown = false;

  /**
   * @param options - Serial device, message handler and reply defaults.
   * @param options.serialPort - Device path, e.g. `/dev/ttyUSB0`.
   * @param options.replyTimeoutMs - Default reply deadline for {@link send} (3000ms).
   */
  constructor(private readonly options: GatewayOptions) {
    super();
    this.replyTimeoutMs = options.replyTimeoutMs ?? 3_000;
  }

  /**
   * Builds both stacks and resolves with the reason the run ended. A serial
   * link failure rejects instead.
   */
  public start(): Promise<ExitReason> {
    if (this.running) return this.running;

    this.running = new Promise<ExitReason>((resolve, reject) => {
      this.settleRun = { resolve, reject };
    });

    const handler: MessageHandler<Packet> = (msg) => this.handleMessage(msg);
    const [msgProtocol, msgTransport] = createMessageStack<Command, Packet>(this, handler, {
      highWaterMark: this.options.highWaterMark,
    });
    this.msgProtocol = msgProtocol;
    this.msgTransport = msgTransport;

    [this.pktProtocol, this.pktTransport] = createPacketStack(this, msgTransport, this.options.serialPort, {
      openPort: this.options.openPort,
    });

    dlog('ramses:gateway', `started on ${this.options.serialPort}`);
    return this.running;
  }

  /**
   * Queues `cmd`, optionally expecting a reply on `cmd.rxHeader`.
   *
   * @remarks
   * The reply callback's deadline is only checked when some message arrives;
   * see {@link CallbackRegistry}.
   */
  public async send(cmd: Command, options: SendOptions = {}): Promise<void> {
    if (!this.msgProtocol) throw new TransportClosedError('gateway has not been started');

    if (options.callback) {
      const daemon = options.daemon ?? false;
      this.callbacks.register(cmd.rxHeader, options.callback, {
        daemon,
        deadline: daemon ? undefined : Date.now() + (options.timeoutMs ?? this.replyTimeoutMs),
      });
    }
    await this.msgProtocol.sendData(cmd);
  }

  /**
   * Sends `cmd` and resolves with its reply.
   *
   * Only one request waits per reply header: a newer request for the same
   * header rejects the older one with {@link RequestSupersededError}.
   * Requests still waiting when the run ends reject with
   * {@link TransportClosedError}.
   *
   * @throws {@link ReplyTimeoutError} once the deadline is seen to have passed.
   */
  public request(cmd: Command, timeoutMs?: number): Promise<Message<Packet>> {
    const header = cmd.rxHeader;
    this.pendingRequests.get(header)?.(new RequestSupersededError(header));

    return new Promise((resolve, reject) => {
      const release = () => {
        if (this.pendingRequests.get(header) === fail) this.pendingRequests.delete(header);
      };
      const fail = (err: Error) => {
        release();
        reject(err);
      };
      this.pendingRequests.set(header, fail);

      const callback: CallbackFn<[], Packet> = (outcome) => {
        release();
        if (outcome.expired) reject(new ReplyTimeoutError(outcome.header));
        else resolve(outcome.msg);
      };
      this.send(cmd, { callback, timeoutMs }).catch((err: unknown) => {
        if (this.pendingRequests.get(header) === fail) this.callbacks.remove(header);
        fail(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }

  /** Drains queued commands, then ends the run as `'graceful'`. */
  public shutdown(): void {
    this.exitReason ??= 'graceful';
    this.closeMessageLayer();
  }

  /** Drains queued commands, then ends the run as `'interrupted'`. */
  public interrupt(): void {
    this.exitReason ??= 'interrupted';
    this.closeMessageLayer();
  }

  /**
   * Called by the message protocol once its transport has lost the
   * connection. Closes the serial link; the run settles when it is gone.
   */
  public stop(exc?: Error): void {
    if (this.stopping) return;
    this.stopping = true;
    dlog('ramses:gateway', 'stop()', exc?.message ?? '');

    if (this.pktTransport && !this.linkDown) {
      this.pktTransport.close();
      return;
    }
    this.settle();
  }

  /**
   * Called by the packet layer when the serial link ends.
   */
  public linkLost(exc?: Error): void {
    this.linkDown = true;

    if (this.stopping) {
      if (exc) console.warn('[Gateway] error while closing serial port:', exc.message);
      this.settle();
      return;
    }

    if (exc) {
      console.error('[Gateway] serial link failed:', exc.message);
      this.fault ??= exc;
    } else {
      this.exitReason ??= 'eof';
    }

    // nothing queued can reach the device any more
    if (this.msgTransport) this.msgTransport.abort();
    else this.stop(exc);
  }

  private closeMessageLayer() {
    if (this.msgTransport) this.msgTransport.close();
    else this.stop();
  }

  private handleMessage(msg: Message<Packet>): void | Promise<void> {
    this.emit('message', msg);
    return this.options.msgHandler?.(msg);
  }

  private settle() {
    if (!this.settleRun) return;
    const { resolve, reject } = this.settleRun;
    this.settleRun = undefined;

    for (const [header, fail] of [...this.pendingRequests]) {
      this.callbacks.remove(header);
      fail(new TransportClosedError('gateway stopped before the reply arrived'));
    }

    if (this.fault) {
      reject(this.fault);
      return;
    }
    const reason = this.exitReason ?? 'graceful';
    dlog('ramses:gateway', `stopped (${reason})`);
    this.emit('stopped', reason);
    resolve(reason);
  }
}
