import type { Command } from '../types/wire.js';

/**
 * The event side of a transport/protocol pair.
 *
 * Call order: `connectionMade` → `dataReceived`* → `connectionLost` (once).
 * `pauseWriting`/`resumeWriting` may arrive at any point in between.
 *
 * @template T - The transport this protocol is bound to.
 * @template D - The unit delivered by `dataReceived`.
 */
export interface Protocol<T, D> {
  connectionMade(transport: T): void;
  dataReceived(data: D): void;
  connectionLost(exc?: Error): void;
  pauseWriting(): void;
  resumeWriting(): void;
}

/**
 * What the message layer needs from the layer below it: a way to send one
 * command and learn when it has gone out.
 */
export interface PacketSender<C extends Command = Command> {
  sendData(cmd: C): Promise<void>;
}

/**
 * Receives each decoded inbound packet from the packet layer.
 */
export type PacketHandler<P> = (pkt: P) => void;
