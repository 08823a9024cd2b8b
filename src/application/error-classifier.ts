import { z } from 'zod';
import { ApiError, ErrorCode } from '../domain/errors.js';
import { TransportError } from '../infrastructure/transport/types.js';

const ERROR_DETAIL_TYPE = 'v1.ErrorDetail';

/**
 * JSON form of the service's `v1.ErrorDetail` message.
 * proto3 JSON omits default values, so every field is optional.
 */
const errorDetailSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
  field: z.string().optional(),
  metadata: z.record(z.string(), z.string()).optional(),
});

/**
 * Extracts a structured {@link ApiError} from any thrown value.
 *
 * - `null`/`undefined` → `null`
 * - an `ApiError` is returned as-is
 * - a {@link TransportError} carrying a `v1.ErrorDetail` → code, message,
 *   field and metadata from the detail
 * - anything else → code `Unspecified`, status `unknown`, raw message kept
 */
export function parseError(err: unknown): ApiError | null {
  if (err === null || err === undefined) return null;
  if (err instanceof ApiError) return err;

  if (!(err instanceof TransportError)) {
    return new ApiError({
      code: ErrorCode.Unspecified,
      message: err instanceof Error ? err.message : String(err),
      status: 'unknown',
    });
  }

  let code: number = ErrorCode.Unspecified;
  let message = err.message;
  let field = '';
  let metadata: Record<string, string> = {};

  for (const detail of err.details) {
    if (detail.type !== ERROR_DETAIL_TYPE) continue;

    const parsed = errorDetailSchema.safeParse(detail.debug);
    if (!parsed.success) continue;

    code = parsed.data.code ?? ErrorCode.Unspecified;
    if (parsed.data.message) message = parsed.data.message;
    field = parsed.data.field ?? '';
    if (parsed.data.metadata) metadata = parsed.data.metadata;
    break;
  }

  return new ApiError({ code, message, field, metadata, status: err.code });
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
