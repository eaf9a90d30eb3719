/**
 * Pipeline error taxonomy.
 *
 * Batch-fatal: ValidationError, NoEncoderAvailableError.
 * Recovered per target/account and reported in the BatchResult: everything else.
 */

export type PipelineErrorCode =
  | 'VALIDATION_ERROR'
  | 'NO_ENCODER_AVAILABLE'
  | 'ENCODE_PROCESS_FAILED'
  | 'OUTPUT_VALIDATION_FAILED'
  | 'PUBLISH_TRANSIENT'
  | 'PUBLISH_REJECTED';

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class ValidationError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super('VALIDATION_ERROR', `Invalid publish request: ${issues.join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class NoEncoderAvailableError extends PipelineError {
  constructor(public readonly tried: string[]) {
    super(
      'NO_ENCODER_AVAILABLE',
      tried.length
        ? `No usable encoder backend (tried: ${tried.join(', ')})`
        : 'No usable encoder backend (nothing configured to try)',
    );
    this.name = 'NoEncoderAvailableError';
  }
}

export class EncodeProcessFailedError extends PipelineError {
  constructor(
    message: string,
    public readonly backend: { name: string; hardware: boolean },
    public readonly details: { exitCode?: number | null; timedOut?: boolean; stderrTail?: string } = {},
    options?: { cause?: unknown },
  ) {
    super('ENCODE_PROCESS_FAILED', message, options);
    this.name = 'EncodeProcessFailedError';
  }
}

export class OutputValidationFailedError extends PipelineError {
  constructor(public readonly check: string, message: string) {
    super('OUTPUT_VALIDATION_FAILED', `Output validation failed (${check}): ${message}`);
    this.name = 'OutputValidationFailedError';
  }
}

export class PublishTransientError extends PipelineError {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super('PUBLISH_TRANSIENT', message, options);
    this.name = 'PublishTransientError';
  }
}

export class PublishRejectedError extends PipelineError {
  constructor(message: string, public readonly status?: number) {
    super('PUBLISH_REJECTED', message);
    this.name = 'PublishRejectedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
