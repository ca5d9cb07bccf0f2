export type FailureKind = 'input' | 'schema' | 'transport' | 'aborted' | 'storage' | 'unknown';

export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Article text unusable for scoring. Never retried. */
export class InputError extends PipelineError {
  readonly code = 'INPUT_ERROR';
}

export class SchemaError extends PipelineError {
  readonly code = 'SCHEMA_ERROR';

  constructor(readonly issues: string[]) {
    super(`Response failed validation: ${issues.join('; ')}`);
  }
}

export class TransportError extends PipelineError {
  readonly code = 'TRANSPORT_ERROR';
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options: { retryable: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

export class ScoringFailedError extends PipelineError {
  readonly code = 'SCORING_FAILED';

  constructor(readonly reason: string, readonly kind: FailureKind, options?: { cause?: unknown }) {
    super(`Scoring failed: ${reason}`, options);
  }
}

export class BatchTooLargeError extends PipelineError {
  readonly code = 'BATCH_TOO_LARGE';

  constructor(readonly requested: number, readonly limit: number) {
    super(`Batch of ${requested} articles exceeds the limit of ${limit}`);
  }
}

export class IncompatibleRepresentationError extends PipelineError {
  readonly code = 'INCOMPATIBLE_REPRESENTATION';

  constructor(readonly expected: string, readonly found: string, readonly articleId: string) {
    super(`Representation of ${articleId} was built by ${found}, expected ${expected}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
