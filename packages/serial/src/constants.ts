/**
 * Physical link settings for an HGI80 / evofw3 gateway. Passed verbatim to
 * the serial port opener.
 */
export const SERIAL_CONFIG = {
  baudRate: 115200,
  dataBits: 8,
  parity: 'none',
  stopBits: 1,
  xon: true,
  xoff: true,
  rtscts: false,
} as const;

export type SerialConfig = typeof SERIAL_CONFIG;

/** Source address used by commands that do not name one. */
export const DEFAULT_GATEWAY_ID = '18:000730';

/** Placeholder for an absent address in a frame. */
export const NON_DEVICE_ID = '--:------';

/** Line terminator the gateway uses in both directions. */
export const LINE_DELIMITER = '\r\n';

/**
 * Codes whose first payload byte (a zone or domain index) is part of the
 * header, so that replies for different zones are told apart.
 */
export const INDEXED_CODES: ReadonlySet<string> = new Set([
  '0004', '0008', '0009', '000A', '1060', '12B0', '2309', '2349', '30C9', '3150', '3220',
]);

export type Verb = ' I' | 'RQ' | 'RP' | ' W';

export const VERBS: readonly Verb[] = [' I', 'RQ', 'RP', ' W'];
