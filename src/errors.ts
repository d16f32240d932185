export class OrchestratorError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.statusCode = statusCode;
  }
}

export class ValidationError extends OrchestratorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends OrchestratorError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, 404);
    this.name = "NotFoundError";
  }
}

export class StepNotFoundError extends OrchestratorError {
  constructor(step: string) {
    super(`Step ${step} is not registered`, 404);
    this.name = "StepNotFoundError";
  }
}

export class StepTimeoutError extends OrchestratorError {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`, 504);
    this.name = "StepTimeoutError";
  }
}

export class JobCancelledError extends OrchestratorError {
  constructor() {
    super("Job cancelled", 409);
    this.name = "JobCancelledError";
  }
}

export class StepExecutionError extends OrchestratorError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`Step ${step} failed: ${describeError(cause)}`, 500, { cause });
    this.name = "StepExecutionError";
    this.step = step;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
