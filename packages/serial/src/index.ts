export { Command, Priority } from './Command.js';
export type { CommandInit } from './Command.js';
export { DEFAULT_GATEWAY_ID, INDEXED_CODES, SERIAL_CONFIG } from './constants.js';
export type { SerialConfig, Verb } from './constants.js';
export { InvalidCommandError, ReplyTimeoutError, RequestSupersededError } from './errors.js';
export { Gateway } from './Gateway.js';
export { GatewayProtocol } from './GatewayProtocol.js';
export type { PacketLayerContext } from './GatewayProtocol.js';
export { Packet } from './Packet.js';
export { runGateway } from './run.js';
export { SerialTransport } from './SerialTransport.js';
export type { SerialTransportExtra } from './SerialTransport.js';
export { createPacketStack } from './stack.js';
export type { PacketStackOptions, PortOpener } from './stack.js';
export type { ExitReason, GatewayEvents, GatewayOptions, SendOptions } from './types.js';
