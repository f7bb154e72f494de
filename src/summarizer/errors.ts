/**
 * Base error for everything the summarizer raises.
 */
export class SummarizerError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A single language service invocation failed.
 */
export class ServiceCallError extends SummarizerError {
  constructor(
    public readonly operation: string,
    message: string,
    cause?: Error,
  ) {
    super(`${operation} failed: ${message}`, cause);
  }
}

/**
 * A language service invocation did not settle within its time budget.
 */
export class ServiceTimeoutError extends ServiceCallError {
  constructor(operation: string, timeoutMs: number) {
    super(operation, `timed out after ${timeoutMs}ms`);
  }
}

/**
 * A language service response broke its contract.
 */
export class MalformedResponseError extends SummarizerError {}

/**
 * The caller aborted the run. Never retried and never degraded.
 */
export class CancellationError extends SummarizerError {
  constructor(message = "Summarization cancelled") {
    super(message);
  }
}

/**
 * Summarizer options failed validation.
 */
export class ConfigurationError extends SummarizerError {}

/**
 * Normalizes an unknown thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
