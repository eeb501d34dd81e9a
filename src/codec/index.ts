import { z } from 'zod';
import { InputValidationException, UnsupportedMediaTypeException } from '../core/exceptions.js';
import { isJsonMediaType, jsonCodec } from './json.js';
import { msgpackCodec } from './msgpack.js';
import type { Codec } from './types.js';

export { jsonCodec, isJsonMediaType } from './json.js';
export { msgpackCodec } from './msgpack.js';
export type { Codec } from './types.js';

/** `Application/JSON; charset=utf-8` → `application/json` */
export function normalizeMediaType(mediaType: string): string {
  return (mediaType.split(';')[0] ?? '').trim().toLowerCase();
}

function findCodec(mediaType: string): Codec | null {
  const normalized = normalizeMediaType(mediaType);
  if (isJsonMediaType(normalized)) return jsonCodec;
  if (msgpackCodec.mediaTypes.includes(normalized)) return msgpackCodec;
  return null;
}

/**
 * Codec for a request `Content-Type`.
 *
 * @throws UnsupportedMediaTypeException
 */
export function getCodec(mediaType: string): Codec {
  const codec = findCodec(mediaType);
  if (!codec) {
    throw new UnsupportedMediaTypeException(normalizeMediaType(mediaType));
  }
  return codec;
}

/**
 * Response codec for an `Accept` header: the supported type with the highest
 * quality, JSON when the header is missing or names nothing supported.
 */
export function negotiateCodec(accept: string | undefined): Codec {
  if (!accept) return jsonCodec;

  const candidates = accept
    .split(',')
    .map((part, index) => {
      const [type = '', ...params] = part.split(';');
      const quality = params
        .map((param) => param.trim())
        .find((param) => param.startsWith('q='));
      return { type: type.trim().toLowerCase(), q: quality ? Number(quality.slice(2)) : 1, index };
    })
    .filter((candidate) => candidate.q > 0)
    .sort((a, b) => b.q - a.q || a.index - b.index);

  for (const candidate of candidates) {
    if (candidate.type === '*/*' || candidate.type === 'application/*') return jsonCodec;
    const codec = findCodec(candidate.type);
    if (codec) return codec;
  }
  return jsonCodec;
}

/**
 * Validates a decoded wire value, reporting every failing path at once.
 *
 * @throws InputValidationException
 */
export function validateWithSchema(value: unknown, schema: z.core.$ZodType): unknown {
  const result = z.safeParse(schema, value);
  if (!result.success) {
    throw InputValidationException.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Decodes `raw` with the codec for `mediaType` and validates the result.
 * Bytes the codec cannot read yield a single issue at the root path.
 *
 * @throws UnsupportedMediaTypeException
 * @throws InputValidationException
 */
export function decodeWithSchema(raw: Uint8Array | string, mediaType: string, schema: z.core.$ZodType): unknown {
  const codec = getCodec(mediaType);

  let value: unknown;
  try {
    value = codec.decode(raw);
  } catch (error) {
    throw new InputValidationException('Malformed request body', [
      {
        path: '',
        message: error instanceof Error ? error.message : String(error),
        code: 'malformed_body',
      },
    ]);
  }

  return validateWithSchema(value, schema);
}
