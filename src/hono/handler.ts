import type { Context, Env, Handler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { negotiateCodec } from '../codec/index.js';
import { ConfigurationException } from '../core/exceptions.js';
import type { HandlerAnnotation } from '../dto/annotation.js';
import type { DTO } from '../dto/factory.js';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export interface DTOBinding {
  dto: DTO;
  annotation: HandlerAnnotation;
}

export interface DTOHandlerContext<E extends Env = Env> {
  /** The decoded request body: a domain value, `DTOData`, or `undefined` without a data DTO. */
  data: unknown;
  ctx: Context<E>;
}

export interface DTOHandlerOptions<E extends Env = Env> {
  /** Unique per route, e.g. `people.create`. Also names the transfer models. */
  handlerId: string;
  data?: DTOBinding;
  return?: DTOBinding;
  /** @default 200 */
  status?: ContentfulStatusCode;
  handle: (context: DTOHandlerContext<E>) => unknown | Promise<unknown>;
}

/**
 * Creates a Hono handler whose body and result go through DTOs.
 *
 * Both bindings are registered right away, so configuration errors surface
 * when the route is declared rather than on its first request.
 *
 * @example
 * ```ts
 * app.post('/people', createDTOHandler({
 *   handlerId: 'people.create',
 *   data: { dto: PersonWrite, annotation: ref.model(Person) },
 *   return: { dto: PersonRead, annotation: ref.model(Person) },
 *   status: 201,
 *   handle: ({ data }) => repository.insert(data),
 * }));
 * ```
 */
export function createDTOHandler<E extends Env = Env>(options: DTOHandlerOptions<E>): Handler<E> {
  const { handlerId, data, status = 200, handle } = options;
  const returns = options.return;

  data?.dto.onRegistration({ annotation: data.annotation, dtoFor: 'data', handlerId });
  const returnBackend = returns?.dto.onRegistration({ annotation: returns.annotation, dtoFor: 'return', handlerId });

  return async (ctx) => {
    let decoded: unknown = undefined;
    if (data) {
      const raw = new Uint8Array(await ctx.req.arrayBuffer());
      const mediaType = ctx.req.header('content-type') ?? 'application/json';
      decoded = data.dto.decodeBytes(handlerId, raw, mediaType);
    }

    const result = await handle({ data: decoded, ctx });

    let body: unknown = result;
    if (returns && returnBackend) {
      if (result === null || result === undefined) {
        if (!returnBackend.nullable) {
          throw new ConfigurationException(`Handler '${handlerId}' returned no value for a non-nullable DTO`, {
            handlerId,
          });
        }
      } else {
        body = returns.dto.encodeData(handlerId, result);
      }
    }

    if (body === undefined) {
      return new Response(null, { status });
    }

    const codec = negotiateCodec(ctx.req.header('accept'));
    return new Response(toArrayBuffer(codec.encode(body)), {
      status,
      headers: { 'Content-Type': codec.mediaTypes[0] ?? 'application/json' },
    });
  };
}
