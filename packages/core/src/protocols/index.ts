export { MessageProtocol } from './MessageProtocol.js';
export type { MessageHandler, ProtocolFactory } from './MessageProtocol.js';
export type { PacketHandler, PacketSender, Protocol } from './Protocol.js';
