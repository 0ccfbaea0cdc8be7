/**
 * Gateway failure taxonomy
 *
 * Every failure the core reports is a GatewayError carrying a kind the
 * caller can branch on. Validation and limit errors are raised locally,
 * before any database session is opened.
 */

export type GatewayErrorKind =
  | "validation_rejected"
  | "resource_limit_exceeded"
  | "execution_failed"
  | "connection_unavailable"
  | "timeout";

export interface GatewayErrorOptions {
  statementIndex?: number;
  durationMs?: number;
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly statementIndex: number | undefined;
  readonly durationMs: number | undefined;
  readonly retryable: boolean;
  readonly suggestion: string;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GatewayError";
    this.kind = kind;
    this.statementIndex = options.statementIndex;
    this.durationMs = options.durationMs;
    // Informational only: the gateway itself never retries.
    this.retryable = kind === "timeout" || kind === "connection_unavailable";
    this.suggestion = GatewayError.getSuggestion(kind);
  }

  static getSuggestion(kind: GatewayErrorKind): string {
    switch (kind) {
      case "validation_rejected":
        return "Only read-only statements (SELECT, WITH, EXPLAIN, SHOW, DESCRIBE) are accepted.";
      case "resource_limit_exceeded":
        return "Split the request into smaller batches.";
      case "execution_failed":
        return "Check SQL syntax, table names and permissions.";
      case "connection_unavailable":
        return "Check network connectivity and database availability.";
      case "timeout":
        return "Consider adding indexes, limiting scope, or increasing the timeout.";
    }
  }

  /** Copy of this error attributed to a statement, unless it already is. */
  atStatement(index: number): GatewayError {
    if (this.statementIndex !== undefined) return this;
    return new GatewayError(this.kind, this.message, {
      statementIndex: index,
      durationMs: this.durationMs,
      cause: this.cause,
    });
  }

  toJSON() {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.statementIndex !== undefined && { statement_index: this.statementIndex }),
      ...(this.durationMs !== undefined && { duration_ms: this.durationMs }),
      retryable: this.retryable,
      suggestion: this.suggestion,
    };
  }
}

/** Message of any thrown value, without inventing one for errors that carry it. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize anything thrown below the gateway into a GatewayError. */
export function toGatewayError(error: unknown, fallback: GatewayErrorKind = "execution_failed"): GatewayError {
  if (error instanceof GatewayError) return error;
  return new GatewayError(fallback, errorMessage(error), { cause: error });
}
