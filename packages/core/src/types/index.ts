export type { Command, Packet, Header } from './wire.js';
export { Message } from './message.js';
