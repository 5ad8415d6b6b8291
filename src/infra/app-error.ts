export type ErrorCategory =
  | "not_found"
  | "invalid_input"
  | "conflict"
  | "downstream_timeout"
  | "downstream_unreachable"
  | "downstream_rejected"
  | "refund_persistence_failed"
  | "internal";

const DEFAULT_STATUS: Record<ErrorCategory, number> = {
  not_found: 404,
  invalid_input: 422,
  conflict: 409,
  downstream_timeout: 504,
  downstream_unreachable: 502,
  downstream_rejected: 502,
  refund_persistence_failed: 502,
  internal: 500,
};

const RETRYABLE_CATEGORIES: ReadonlySet<ErrorCategory> = new Set([
  "downstream_timeout",
  "downstream_unreachable",
  "refund_persistence_failed",
]);

const DOWNSTREAM_CATEGORIES: ReadonlySet<ErrorCategory> = new Set([
  "downstream_timeout",
  "downstream_unreachable",
  "downstream_rejected",
]);

export interface AppErrorOptions {
  statusCode?: number;
  downstreamStatus?: number;
  cause?: unknown;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly downstreamStatus: number | undefined;

  constructor(
    readonly category: ErrorCategory,
    readonly code: string,
    message: string,
    options: AppErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.statusCode = options.statusCode ?? DEFAULT_STATUS[category];
    this.downstreamStatus = options.downstreamStatus;
  }

  get retryable(): boolean {
    return RETRYABLE_CATEGORIES.has(this.category);
  }
}

export function isDownstreamError(error: unknown): error is AppError {
  return error instanceof AppError && DOWNSTREAM_CATEGORIES.has(error.category);
}

export function notFound(resource: string, id: string): AppError {
  return new AppError("not_found", "resource_not_found", `${resource} '${id}' not found.`);
}
