import type { IssueKind, PipelineIssue } from "@habitlens/shared";

/**
 * Base class for every failure the pipeline reports. Each carries a machine-readable
 * kind, a message fit for the caller and a recovery suggestion.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: IssueKind;

  constructor(
    message: string,
    readonly recovery: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toIssue(): PipelineIssue {
    return { kind: this.kind, message: this.message, recovery: this.recovery };
  }
}

/** Input reached an analyzer missing or malformed. Never paired with a partial result. */
export class ValidationError extends PipelineError {
  readonly kind = "validation" as const;

  constructor(
    readonly field: string,
    message: string,
    recovery = `Provide a valid value for '${field}' and try again.`,
  ) {
    super(message, recovery);
  }

  override toIssue(): PipelineIssue {
    return { ...super.toIssue(), field: this.field };
  }
}

/** Analysis could only produce a degraded result. */
export class ProcessingError extends PipelineError {
  readonly kind = "processing" as const;
}

export const GENERIC_SYSTEM_MESSAGE =
  "Part of the analysis service is temporarily unavailable.";

/** A collaborator failed. Carries no internal detail. */
export class SystemError extends PipelineError {
  readonly kind = "system" as const;

  constructor(
    message = GENERIC_SYSTEM_MESSAGE,
    recovery = "Please try again in a few minutes.",
  ) {
    super(message, recovery);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
