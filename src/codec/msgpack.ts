import { decode, encode } from '@msgpack/msgpack';
import { isRecord, type UnknownRecord } from '../core/types.js';
import type { Codec } from './types.js';

const encoder = new TextEncoder();

/**
 * Copy of `value` with bigints written as decimal strings, the way the JSON
 * codec writes them. Dates, binary data and maps are left for the encoder.
 */
function stringifyBigInts(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(stringifyBigInts);
  if (!isRecord(value) || value instanceof Date || value instanceof Map || ArrayBuffer.isView(value)) {
    return value;
  }

  const copy: UnknownRecord = {};
  for (const key of Object.keys(value)) {
    copy[key] = stringifyBigInts(value[key]);
  }
  return copy;
}

export const msgpackCodec: Codec = {
  name: 'msgpack',
  mediaTypes: ['application/msgpack', 'application/x-msgpack', 'application/vnd.msgpack'],

  decode(raw) {
    return decode(typeof raw === 'string' ? encoder.encode(raw) : raw);
  },

  encode(value) {
    return encode(stringifyBigInts(value), { ignoreUndefined: true });
  },
};
