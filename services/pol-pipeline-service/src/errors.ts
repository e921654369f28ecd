export type PipelineStage =
  | "read"
  | "resolve"
  | "merge"
  | "submit"
  | "authentication"
  | "cancelled";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export class ResolutionFailure extends PipelineError {
  constructor(message: string, detail?: unknown) {
    super(message, "resolve", detail);
    this.name = "ResolutionFailure";
  }
}

export class TemplateNotFoundError extends PipelineError {
  constructor(public readonly templateName: string, available: string[]) {
    super(`Unknown POL template "${templateName}" (available: ${available.join(", ") || "none"})`, "merge", {
      available
    });
    this.name = "TemplateNotFoundError";
  }
}

export class SchemaValidationError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`POL record failed validation: ${issues.join("; ")}`, "merge", { issues });
    this.name = "SchemaValidationError";
  }
}

export class SubmissionRejected extends PipelineError {
  constructor(
    public readonly statusCode: number,
    body: unknown
  ) {
    super(`Acquisitions API rejected the POL (HTTP ${statusCode})`, "submit", body);
    this.name = "SubmissionRejected";
  }
}

export class TransientSubmissionError extends PipelineError {
  constructor(
    message: string,
    public readonly attempts: number,
    detail?: unknown
  ) {
    super(message, "submit", detail);
    this.name = "TransientSubmissionError";
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, detail?: unknown) {
    super(message, "authentication", detail);
    this.name = "AuthenticationError";
  }
}

export class BatchReadError extends Error {
  constructor(
    message: string,
    public readonly batchId: string,
    public readonly statusCode: number = 422
  ) {
    super(message);
    this.name = "BatchReadError";
  }
}

export class TemplateStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateStoreError";
  }
}

export function describeError(error: unknown): { message: string; name: string; detail?: unknown } {
  if (error instanceof PipelineError) {
    return { name: error.name, message: error.message, detail: error.detail };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "UnknownError", message: String(error) };
}
