import { Injectable, Logger } from '@nestjs/common';
import path from 'node:path';
import { ImageBuilderService } from './image-builder.service';
import { ImageRunnerService } from './image-runner.service';
import {
  finishRun,
  newStageResult,
  PipelineConfig,
  PipelineOutcome,
  PipelineResult,
  StageConfig,
  StageExecutionResult,
} from './pipeline.types';
import { serializeStageResult } from './stage-result.serializer';
import { commandFailure, FailureStatus, PipelineError, PipelineStatus } from './status';

/**
 * The handler's dir is used as configured, joined only to its own baseDir.
 * The pipeline's default base dir does not apply.
 */
export function handlerDir(handler: StageConfig): string {
  return handler.baseDir ? path.join(handler.baseDir, handler.dir) : handler.dir;
}

export interface Escalation {
  pipeline: PipelineConfig;
  /** Accumulated so far; the failed stage and the handler's record are appended to it. */
  result: PipelineResult;
  /** Record of the failing stage, possibly with only its build half. */
  failed: StageExecutionResult;
  status: FailureStatus;
  message: string;
  volumeName: string;
  signal?: AbortSignal;
}

/**
 * Hands a stage failure to the pipeline's error-handler stage.
 *
 * The handler image is built and run with the failing stage's serialized
 * result on stdin. It gets only its own build and run env; pipeline defaults
 * are not applied. A handler that succeeds does not rescue the run: the final
 * status and error stay those of the original failure. A handler that fails
 * replaces them with ErrorHandlerError and its own error.
 *
 * The shared volume is left in place on every path through here.
 */
@Injectable()
export class ErrorHandlerService {
  private readonly logger = new Logger(ErrorHandlerService.name);

  constructor(
    private readonly builder: ImageBuilderService,
    private readonly runner: ImageRunnerService,
  ) {}

  async handle(escalation: Escalation): Promise<PipelineOutcome> {
    const { pipeline, result, failed, status, message, volumeName, signal } = escalation;

    failed.finalTime = new Date();
    result.stageResults.push(failed);
    this.logger.error(message);

    const handler = pipeline.errorHandler;
    if (!handler) {
      return finishRun(result, status, new PipelineError(status, message));
    }

    const id = `${result.name}/${failed.stage} calls error handler`;
    const dir = handlerDir(handler);
    const ser = newStageResult(handler.name);

    const build = await this.builder.build(
      id,
      dir,
      handler.buildEnv,
      signal,
    );
    ser.buildResult = build.result;
    const buildFailure = commandFailure(build, PipelineStatus.BuildError, id, true);
    if (buildFailure) {
      return this.handlerFailed(result, ser, buildFailure);
    }

    const input = JSON.stringify(serializeStageResult(failed));
    const run = await this.runner.run(
      id,
      dir,
      input,
      handler.runEnv,
      volumeName,
      signal,
    );
    ser.runResult = run.result;
    const runFailure = commandFailure(run, PipelineStatus.RunError, id, true);
    if (runFailure) {
      return this.handlerFailed(result, ser, runFailure);
    }

    ser.finalTime = new Date();
    result.stageResults.push(ser);
    this.logger.log(`Error handler ${handler.name} processed the failure of ${failed.stage}`);

    return finishRun(result, status, new PipelineError(status, message));
  }

  private handlerFailed(
    result: PipelineResult,
    ser: StageExecutionResult,
    message: string,
  ): PipelineOutcome {
    ser.finalTime = new Date();
    result.stageResults.push(ser);
    this.logger.error(message);
    return finishRun(
      result,
      PipelineStatus.ErrorHandlerError,
      new PipelineError(PipelineStatus.ErrorHandlerError, message),
    );
  }
}
