import { ERROR_CATEGORIES, type ErrorCategory, ErrorCode } from './codes.js';

/**
 * Base error class for every rejected registry operation.
 *
 * A thrown `RegistryError` means the operation was aborted before any
 * registry state changed. Callers branch on {@link RegistryError.code}
 * (or the coarser {@link RegistryError.category}) and either correct the
 * input or resubmit; nothing is retried internally.
 *
 * @example
 * ```typescript
 * try {
 *   registry.identity.register({ domain: 'bot.example', address }, { sender: address });
 * } catch (err) {
 *   if (isRegistryError(err, ErrorCode.DOMAIN_ALREADY_REGISTERED)) {
 *     // pick another domain
 *   }
 * }
 * ```
 */
export class RegistryError extends Error {
  /** Structured error code for programmatic handling */
  public readonly code: ErrorCode;

  /** Error family derived from the code */
  public readonly category: ErrorCategory;

  /** Offending values, for logs */
  public readonly details?: Readonly<Record<string, unknown>> | undefined;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }
}

/** Narrow an unknown error to a {@link RegistryError}, optionally of one code. */
export function isRegistryError(err: unknown, code?: ErrorCode): err is RegistryError {
  return err instanceof RegistryError && (code === undefined || err.code === code);
}

export { ErrorCode };
export type { ErrorCategory };
