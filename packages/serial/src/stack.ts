import type { MessageTransport } from '@ramses-link/core';
import type { SerialPortStream } from '@serialport/stream';
import type { Command } from './Command.js';
import type { SerialConfig } from './constants.js';
import type { PacketLayerContext } from './GatewayProtocol.js';
import type { Packet } from './Packet.js';

import { SerialPort } from 'serialport';
import { dlog } from '@ramses-link/core';
import { SERIAL_CONFIG } from './constants.js';
import { GatewayProtocol } from './GatewayProtocol.js';
import { SerialTransport } from './SerialTransport.js';

/**
 * Opens the serial device at `path` with the given link settings.
 */
export type PortOpener = (path: string, config: SerialConfig) => SerialPortStream;

export interface PacketStackOptions {
  /**
   * Replaces the default opener, which uses `serialport`'s `SerialPort`.
   */
  openPort?: PortOpener;
}

const openSerialPort: PortOpener = (path, config) => new SerialPort({ path, ...config });

/**
 * Opens the serial link and builds the packet-layer pair beneath
 * `msgTransport`, whose dispatcher is pointed at the packet protocol.
 */
export function createPacketStack(
  gwy: PacketLayerContext,
  msgTransport: MessageTransport<Command, Packet>,
  serialPort: string,
  options: PacketStackOptions = {},
): [GatewayProtocol, SerialTransport] {
  dlog('ramses:serial', `opening ${serialPort}`);
  const openPort = options.openPort ?? openSerialPort;
  const serial = openPort(serialPort, SERIAL_CONFIG);

  const pktProtocol = new GatewayProtocol(msgTransport.pktReceiver, gwy);
  const pktTransport = new SerialTransport(pktProtocol, serial);

  msgTransport.setDispatcher(pktProtocol.sendData.bind(pktProtocol));
  return [pktProtocol, pktTransport];
}
