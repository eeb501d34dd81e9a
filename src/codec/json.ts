import type { Codec } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Bigints are written as strings; JSON has no bigint type. */
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export const jsonCodec: Codec = {
  name: 'json',
  mediaTypes: ['application/json'],

  decode(raw) {
    const text = typeof raw === 'string' ? raw : decoder.decode(raw);
    const value: unknown = JSON.parse(text);
    return value;
  },

  encode(value) {
    return encoder.encode(JSON.stringify(value, replacer) ?? 'null');
  },
};

/** `application/json` and any `+json` structured syntax suffix. */
export function isJsonMediaType(mediaType: string): boolean {
  return mediaType === 'application/json' || mediaType.endsWith('+json');
}
