/**
 * Structured error model for SimpleEmailAPI.
 *
 * Every failure returned by the service carries a stable numeric code.
 * Codes are grouped by hundreds:
 * 1xx auth, 2xx authz, 3xx validation, 4xx resources, 5xx domain,
 * 6xx rate/usage, 7xx attachments, 8xx tokens, 9xx internal.
 */

export const ErrorCode = {
  Unspecified: 0,

  // Authentication (1xx)
  Unauthenticated: 100,
  InvalidApiKey: 101,
  ExpiredApiKey: 102,
  ClerkTokenInvalid: 104,

  // Authorization (2xx)
  PermissionDenied: 200,
  AdminRequired: 201,
  AccountSuspended: 202,
  InsufficientScope: 203,

  // Validation (3xx)
  InvalidArgument: 300,
  MissingRequiredField: 301,
  InvalidEmailSyntax: 302,
  NoMxRecords: 303,
  EmailTypoDetected: 304,
  UnsafeUrl: 305,
  EmailSuppressed: 306,
  SandboxRestriction: 307,

  // Resource not found (4xx)
  NotFound: 400,
  DomainNotFound: 401,
  ApiKeyNotFound: 402,
  UserNotFound: 403,
  AlreadyExists: 410,
  DomainAlreadyExists: 411,

  // Domain verification (5xx)
  DomainNotOwned: 500,
  DomainNotVerified: 501,
  DomainDnsMismatch: 502,
  DomainVerifyCooldown: 503,

  // Rate limiting & usage (6xx)
  RateLimited: 600,
  DailyLimitExceeded: 601,
  MonthlyCreditsExhausted: 602,
  MaxConcurrentStreams: 603,

  // Attachments (7xx)
  AttachmentTooLarge: 700,
  TotalSizeExceeded: 701,
  AttachmentThreatFound: 702,
  UnsupportedContentType: 703,

  // Tokens (8xx)
  InvalidToken: 800,
  ExpiredToken: 801,
  WebhookSecretInvalid: 810,

  // Internal (9xx)
  Internal: 900,
  UpstreamProviderError: 901,
  ServiceUnavailable: 902,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Connect status codes, as they appear in the `code` field of a
 * Connect error body.
 */
export const CONNECT_CODES = [
  'canceled',
  'unknown',
  'invalid_argument',
  'deadline_exceeded',
  'not_found',
  'already_exists',
  'permission_denied',
  'resource_exhausted',
  'failed_precondition',
  'aborted',
  'out_of_range',
  'unimplemented',
  'internal',
  'unavailable',
  'data_loss',
  'unauthenticated',
] as const;

export type ConnectCode = (typeof CONNECT_CODES)[number];

export type ErrorCategory =
  | 'auth'
  | 'authz'
  | 'validation'
  | 'notfound'
  | 'domain'
  | 'ratelimit'
  | 'internal';

/**
 * Half-open code ranges per category. `internal` has no upper bound.
 * 410–499 and 700–899 are intentionally unmapped: match those with `is()`.
 */
const CATEGORY_RANGES: Record<ErrorCategory, readonly [number, number]> = {
  auth: [100, 200],
  authz: [200, 300],
  validation: [300, 400],
  notfound: [400, 410],
  domain: [500, 600],
  ratelimit: [600, 700],
  internal: [900, Number.POSITIVE_INFINITY],
};

export interface ApiErrorInit {
  /** Numeric API code; codes the SDK does not know are kept as-is. */
  code: number;
  message: string;
  /** Offending request field, for validation errors. */
  field?: string;
  /** Extra context such as limits or upgrade URLs. */
  metadata?: Record<string, string>;
  status?: ConnectCode;
}

/**
 * A classified failure from the API.
 *
 * @example
 * ```ts
 * const err = parseError(caught);
 * if (err?.is(ErrorCode.DomainNotVerified)) { ... }
 * if (err?.isCategory('validation')) console.log(err.field);
 * ```
 */
export class ApiError extends Error {
  readonly code: number;
  readonly field: string;
  readonly metadata: Readonly<Record<string, string>>;
  readonly status: ConnectCode;

  constructor(init: ApiErrorInit) {
    super(init.message);
    this.name = 'ApiError';
    this.code = init.code;
    this.field = init.field ?? '';
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
    this.status = init.status ?? 'unknown';
  }

  is(code: number): boolean {
    return this.code === code;
  }

  isCategory(category: string): boolean {
    if (!isErrorCategory(category)) return false;
    const [min, max] = CATEGORY_RANGES[category];
    return this.code >= min && this.code < max;
  }
}

function isErrorCategory(value: string): value is ErrorCategory {
  return Object.prototype.hasOwnProperty.call(CATEGORY_RANGES, value);
}
