import type { Protocol, Transport } from '@ramses-link/core';
import type { SerialPortStream } from '@serialport/stream';

import { ReadlineParser } from 'serialport';
import { TransportClosedError, dlog } from '@ramses-link/core';
import { LINE_DELIMITER } from './constants.js';

/**
 * Values available through {@link SerialTransport.getExtraInfo}.
 */
export interface SerialTransportExtra {
  serial: SerialPortStream;
  path: string;
}

/**
 * SerialTransport wraps a serial port stream and implements the
 * {@link Transport} interface for the packet layer.
 *
 * Input is split into lines on `\r\n` and each line is handed to the
 * protocol's `dataReceived`. A `close` or `error` on the port is reported to
 * the protocol as a single `connectionLost`.
 */
export class SerialTransport implements Transport<string, SerialTransportExtra> {
  private closing = false;
  private lost = false;
  private writePaused = false;

  /**
   * @param protocol - The packet-layer protocol; `connectionMade` is called immediately.
   * @param serial - An opened (or auto-opening) serial port stream.
   */
  constructor(
    private readonly protocol: Protocol<SerialTransport, string>,
    private readonly serial: SerialPortStream,
  ) {
    const parser = serial.pipe(new ReadlineParser({ delimiter: LINE_DELIMITER }));
    parser.on('data', (line: string) => {
      if (!this.lost) this.protocol.dataReceived(line);
    });

    serial.on('close', (err?: Error) => this.connectionLost(err));
    serial.on('error', (err: Error) => this.connectionLost(err));

    this.protocol.connectionMade(this);
  }

  /**
   * Writes one frame and resolves once the port has accepted it. When the
   * port's buffer passes its high-water mark the protocol is paused until
   * the port drains.
   */
  public write(data: string): Promise<void> {
    if (this.closing) return Promise.reject(new TransportClosedError('serial port is closing or has closed'));

    dlog('ramses:serial', `write(${JSON.stringify(data)})`);
    return new Promise((resolve, reject) => {
      const ok = this.serial.write(data, (err) => (err ? reject(err) : resolve()));
      if (!ok) this.pauseUntilDrained();
    });
  }

  public close(): void {
    if (this.closing) return;
    this.closing = true;
    dlog('ramses:serial', 'close()');

    if (!this.serial.isOpen) {
      this.connectionLost();
      return;
    }
    this.serial.close((err) => {
      if (err) this.connectionLost(err);
    });
  }

  /**
   * Flushes the port, discarding data not yet transmitted, then closes it.
   */
  public abort(): void {
    if (!this.closing && this.serial.isOpen) {
      dlog('ramses:serial', 'abort(): flushing');
      this.serial.flush((err) => {
        if (err) dlog('ramses:serial', 'flush failed:', err.message);
      });
    }
    this.close();
  }

  public isClosing(): boolean {
    return this.closing;
  }

  public getExtraInfo<K extends keyof SerialTransportExtra>(name: K): SerialTransportExtra[K] | undefined {
    const extra: SerialTransportExtra = { serial: this.serial, path: this.serial.path };
    return extra[name];
  }

  private connectionLost(exc?: Error) {
    if (this.lost) return;
    this.lost = true;
    this.closing = true;
    dlog('ramses:serial', 'connectionLost()', exc?.message ?? '');
    // a paused writer must reach write() and fail rather than wait for a drain
    this.resumeProtocol();
    this.protocol.connectionLost(exc);
  }

  private pauseUntilDrained() {
    if (this.writePaused) return;
    dlog('ramses:serial', 'port buffer full, pausing writes');
    this.writePaused = true;
    this.protocol.pauseWriting();
    this.serial.once('drain', () => this.resumeProtocol());
  }

  private resumeProtocol() {
    if (!this.writePaused) return;
    this.writePaused = false;
    this.protocol.resumeWriting();
  }
}
