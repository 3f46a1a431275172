/**
 * Terminal classification of a pipeline run.
 */
export const PipelineStatus = {
  OK: 'OK',
  SetupError: 'SetupError',
  BuildError: 'BuildError',
  RunError: 'RunError',
  ErrorHandlerError: 'ErrorHandlerError',
} as const;
export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

export type FailureStatus = Exclude<PipelineStatus, 'OK'>;

/** The process could not be started at all (missing binary, missing cwd, cancelled before spawn). */
export const EXIT_NOT_STARTED = -2;
/** The process was terminated by a signal (timeout or cancellation). */
export const EXIT_SIGNALED = -1;

const STATUS_TEXT: Record<PipelineStatus, string> = {
  OK: 'OK',
  SetupError: 'SetupError',
  BuildError: 'BuildError',
  RunError: 'RunError',
  ErrorHandlerError: 'ErrorHandlerError',
};

export function statusText(status: PipelineStatus): string {
  return STATUS_TEXT[status];
}

/**
 * Exit status 0 is OK; anything else is the failure status of the phase that ran the command.
 */
export function classifyExit(exitStatus: number, failure: FailureStatus): PipelineStatus {
  return exitStatus === 0 ? PipelineStatus.OK : failure;
}

/**
 * Describes why a build or run did not succeed, or returns null when it did.
 * Start failures carry the wrapped error; non-zero exits carry the code.
 */
export function commandFailure(
  outcome: { result: { exitStatus: number }; error: Error | null },
  phase: 'BuildError' | 'RunError',
  id: string,
  forHandler = false,
): string | null {
  const verb = phase === PipelineStatus.BuildError ? 'building' : 'running';
  const prefix = `error when ${verb} image${forHandler ? ' for error handler' : ''}`;
  if (outcome.error) {
    return `${prefix}: ${outcome.error.message}`;
  }
  const exitStatus = outcome.result.exitStatus;
  const classification = classifyExit(exitStatus, phase);
  if (classification !== PipelineStatus.OK) {
    return `${prefix}: status code ${exitStatus}(${statusText(classification)}) when ${verb} image for ${id}`;
  }
  return null;
}

export class PipelineError extends Error {
  constructor(
    public readonly status: FailureStatus,
    message: string,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
