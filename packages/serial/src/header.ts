import type { Header } from '@ramses-link/core';
import type { Verb } from './constants.js';

import { INDEXED_CODES } from './constants.js';

/**
 * Builds the correlation header for a frame. `device` is the far end of the
 * exchange: the destination of a request, the source of a reply.
 */
export function makeHeader(code: string, verb: Verb, device: string, payload: string): Header {
  const header = `${code}|${verb}|${device}`;
  return INDEXED_CODES.has(code) && payload.length >= 2 ? `${header}|${payload.slice(0, 2)}` : header;
}

export function isRequest(verb: Verb): boolean {
  return verb === 'RQ' || verb === ' W';
}
