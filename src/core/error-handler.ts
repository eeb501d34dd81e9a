import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, ERROR_CODES, InputValidationException, type ApiErrorBody } from './exceptions.js';
import { getLogger } from './logger.js';

/**
 * Turns an error the handler does not know into an ApiException.
 * Returning undefined passes the error on to the next mapper.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Observes every error once it is mapped, before the response is sent.
 * Hooks do not delay the response; their failures go to `onHookError`.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Tried in order before the built-in zod mapper; the first result wins. */
  mappers?: ErrorMapper<E>[];
  hooks?: ErrorHook<E>[];
  /** Adds `error.stack` to responses. Development only. */
  includeStackTrace?: boolean;
  defaultErrorCode?: string;
  defaultErrorMessage?: string;
  /** Default: true. */
  logUnmappedErrors?: boolean;
  onHookError?: (hookError: unknown, originalError: Error, ctx: Context<E>) => void;
}

/** Maps a ZodError thrown inside a handler to a 400. */
export function zodErrorMapper(error: Error): ApiException | undefined {
  return error instanceof ZodError ? InputValidationException.fromZodError(error) : undefined;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runMappers<E extends Env>(
  mappers: readonly ErrorMapper<E>[],
  err: Error,
  ctx: Context<E>
): Promise<ApiException | undefined> {
  for (const mapper of mappers) {
    try {
      const mapped = await mapper(err, ctx);
      if (mapped) return mapped;
    } catch (mapperError) {
      getLogger().warn('Error mapper failed', { error: describeFailure(mapperError) });
    }
  }
  return undefined;
}

function runHooks<E extends Env>(
  hooks: readonly ErrorHook<E>[],
  err: Error,
  ctx: Context<E>,
  apiException: ApiException,
  onHookError: ErrorHandlerConfig<E>['onHookError']
): void {
  const report = (hookError: unknown): void => onHookError?.(hookError, err, ctx);
  for (const hook of hooks) {
    try {
      const pending = hook(err, ctx, apiException);
      if (pending instanceof Promise) pending.catch(report);
    } catch (hookError) {
      report(hookError);
    }
  }
}

/**
 * Creates a Hono `onError` handler that answers every error with an
 * {@link ApiErrorBody}.
 *
 * ApiExceptions keep their status and code, so a configuration error raised
 * while a DTO binds answers 500, a payload that fails validation 400 and an
 * unknown content type 415. Other HTTPExceptions keep their status under
 * `HTTP_ERROR`. Everything else goes through the mappers and, if none
 * claims it, becomes a logged 500.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.onError(createErrorHandler({
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) reportToTracker(error);
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(config: ErrorHandlerConfig<E> = {}): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeStackTrace = false,
    defaultErrorCode = ERROR_CODES.internal,
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;
  const chain: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  async function toApiException(err: Error, ctx: Context<E>): Promise<ApiException> {
    if (err instanceof ApiException) return err;
    if (err instanceof HTTPException) return new ApiException(err.message, err.status, ERROR_CODES.http);

    const mapped = await runMappers(chain, err, ctx);
    if (mapped) return mapped;

    if (logUnmappedErrors) {
      getLogger().error('Unmapped error', { name: err.name, message: err.message, stack: err.stack });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  }

  return async (err, ctx) => {
    const apiException = await toApiException(err, ctx);
    runHooks(hooks, err, ctx, apiException, onHookError);

    const body: ApiErrorBody = apiException.toJSON();
    if (includeStackTrace && err.stack) body.error.stack = err.stack;
    return ctx.json(body, apiException.status);
  };
}
