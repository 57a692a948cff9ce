export type ErrorCode =
  | "unauthorized"
  | "store_unavailable"
  | "upstream_timeout"
  | "upstream_failed"
  | "duplicate_service_tag";

export class InterpreterError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends InterpreterError {
  constructor(readonly role: string) {
    super("unauthorized", `role ${role} cannot modify resources`, false);
  }
}

export class StoreUnavailableError extends InterpreterError {
  constructor(message: string, cause?: unknown) {
    super("store_unavailable", message, true, { cause });
  }
}

export class UpstreamServiceTimeoutError extends InterpreterError {
  constructor(readonly timeoutMs: number) {
    super("upstream_timeout", `language service did not answer within ${timeoutMs}ms`, true);
  }
}

export class UpstreamServiceError extends InterpreterError {
  constructor(message: string, cause?: unknown) {
    super("upstream_failed", message, true, { cause });
  }
}

export class DuplicateServiceTagError extends InterpreterError {
  constructor(readonly serviceTag: string) {
    super("duplicate_service_tag", `service tag ${serviceTag} is already in use`, false);
  }
}

export function isInterpreterError(err: unknown): err is InterpreterError {
  return err instanceof InterpreterError;
}
