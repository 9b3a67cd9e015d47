import type { PacketHandler, PacketSender, Protocol } from '@ramses-link/core';
import type { Command } from './Command.js';
import type { SerialTransport } from './SerialTransport.js';

import { Signal, TransportClosedError, dlog } from '@ramses-link/core';
import { LINE_DELIMITER } from './constants.js';
import { Packet } from './Packet.js';

/**
 * What the packet layer reports upwards besides packets.
 */
export interface PacketLayerContext {
  /** The serial link ended; `exc` is set when it failed rather than closed. */
  linkLost(exc?: Error): void;
}

/**
 * The packet-layer protocol: turns gateway lines into {@link Packet}s for the
 * message transport, and frames outbound {@link Command}s for the serial port.
 */
export class GatewayProtocol implements Protocol<SerialTransport, string>, PacketSender<Command> {
  private transport?: SerialTransport;
  private paused = false;
  private readonly resumed = new Signal();

  /**
   * @param pktHandler - Receives every valid packet, usually `msgTransport.pktReceiver`.
   * @param gwy - Told when the serial link goes away.
   */
  constructor(
    private readonly pktHandler: PacketHandler<Packet>,
    private readonly gwy: PacketLayerContext,
  ) { }

  public connectionMade(transport: SerialTransport): void {
    dlog('ramses:packet', 'connectionMade()');
    this.transport = transport;
  }

  public dataReceived(line: string): void {
    const text = line.trim();
    if (!text) return;

    if (text.startsWith('#')) {
      dlog('ramses:packet', `gateway says: ${text}`);
      return;
    }

    const pkt = Packet.parse(text);
    if (!pkt) {
      dlog('ramses:packet', `invalid packet (dropped): ${text}`);
      return;
    }
    this.pktHandler(pkt);
  }

  /**
   * Frames `cmd` and resolves once the serial port has accepted it.
   */
  public async sendData(cmd: Command): Promise<void> {
    while (this.paused) await this.resumed.wait();

    if (!this.transport) throw new TransportClosedError('packet layer is not connected');
    dlog('ramses:packet', `sendData(${String(cmd)})`);
    await this.transport.write(`${String(cmd)}${LINE_DELIMITER}`);
  }

  public connectionLost(exc?: Error): void {
    dlog('ramses:packet', 'connectionLost()', exc?.message ?? '');
    this.gwy.linkLost(exc);
  }

  public pauseWriting(): void {
    this.paused = true;
  }

  public resumeWriting(): void {
    this.paused = false;
    this.resumed.notify();
  }

  public get isWritingPaused(): boolean {
    return this.paused;
  }
}
