import type { Header, Packet } from './wire.js';

/**
 * A packet as seen by the message layer.
 *
 * @template P - The concrete packet type produced by the packet layer.
 */
export class Message<P extends Packet = Packet> {
  public readonly header: Header;
  public readonly dtm: Date;

  constructor(public readonly packet: P) {
    this.header = packet.header;
    this.dtm = packet.dtm;
  }

  public toString(): string {
    return `${this.dtm.toISOString()} ${String(this.packet)}`;
  }
}
