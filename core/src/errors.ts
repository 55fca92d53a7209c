/**
 * Firewall error class (shared).
 *
 * Registration and configuration failures are thrown as FirewallError.
 * Per-call failures never throw: they travel as CallOutcome values and
 * log sub-events, carrying the same codes.
 */

// ── Error Codes ─────────────────────────────────────────────────────

export type FirewallErrorCode =
  | "SPEC_ERROR"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "MIDDLEWARE_REJECTED"
  | "RATE_LIMITED"
  | "CALLBACK_ERROR"
  | "ASSERTION_FAILED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INVALID_REQUEST"
  | "INTERNAL_ERROR";

/**
 * Structured error for registration, configuration and transport failures.
 */
export class FirewallError extends Error {
  public readonly code: FirewallErrorCode;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: FirewallErrorCode;
    message: string;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "FirewallError";
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
  }
}

export function isFirewallError(err: unknown, code?: FirewallErrorCode): err is FirewallError {
  return err instanceof FirewallError && (code === undefined || err.code === code);
}

/** Message of any thrown value, for logs and sub-events. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
