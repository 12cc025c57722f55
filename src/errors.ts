export type PipelineErrorCode =
  | "PLANNING_FAILURE"
  | "RETRIEVAL_FAILURE"
  | "SYNTHESIS_FAILURE"
  | "VALIDATION_FAILURE"
  | "RATE_LIMIT_EXCEEDED"
  | "UPSTREAM_TIMEOUT"
  | "MALFORMED_MODEL_OUTPUT"
  | "CIRCUIT_OPEN"
  | "CONFIGURATION";

interface PipelineErrorOptions {
  code: PipelineErrorCode;
  retryable: boolean;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  readonly retryable: boolean;

  constructor(message: string, { code, retryable, cause }: PipelineErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/** Recovered inside the planner by falling back to an out-of-scope plan. */
export class PlanningFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "PLANNING_FAILURE", retryable: false, cause });
  }
}

export class RetrievalFailure extends PipelineError {
  readonly source: "vector" | "graph";

  constructor(source: "vector" | "graph", message: string, cause?: unknown) {
    super(message, { code: "RETRIEVAL_FAILURE", retryable: true, cause });
    this.source = source;
  }
}

export class SynthesisFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "SYNTHESIS_FAILURE", retryable: true, cause });
  }
}

export class ValidationFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "VALIDATION_FAILURE", retryable: true, cause });
  }
}

export class RateLimitExceededError extends PipelineError {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause?: unknown) {
    super(`Rate limit still exceeded for ${operation} after ${attempts} attempts`, {
      code: "RATE_LIMIT_EXCEEDED",
      retryable: true,
      cause
    });
    this.attempts = attempts;
  }
}

export class UpstreamTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { code: "UPSTREAM_TIMEOUT", retryable: true });
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedModelOutputError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "MALFORMED_MODEL_OUTPUT", retryable: false, cause });
  }
}

export class CircuitOpenError extends PipelineError {
  constructor(host: string) {
    super(`Circuit breaker is open for ${host}`, { code: "CIRCUIT_OPEN", retryable: true });
  }
}

export class ConfigurationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, { code: "CONFIGURATION", retryable: false });
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
