import { Stage } from './types';

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly stage: Stage,
    readonly identity?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Fatal: raised before any job is scheduled
export class ConfigInvariantViolation extends PipelineError {
  constructor(message: string) {
    super(message, 'config');
  }
}

export class EncodeJobFailure extends PipelineError {
  declare readonly stage: 'encode';

  constructor(identity: string, message: string, options?: { cause?: unknown }) {
    super(message, 'encode', identity, options);
  }
}

export class SegmentationFailure extends PipelineError {
  declare readonly stage: 'segment';

  constructor(identity: string, message: string, options?: { cause?: unknown }) {
    super(message, 'segment', identity, options);
  }
}

export class MultiplexMismatch extends PipelineError {
  declare readonly stage: 'multiplex';

  constructor(identity: string, message: string, options?: { cause?: unknown }) {
    super(message, 'multiplex', identity, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type StageError = EncodeJobFailure | SegmentationFailure | MultiplexMismatch;
