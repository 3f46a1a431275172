import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { executorConfig } from '../config/executor.config';
import { mergeEnv } from './environment';
import { ErrorHandlerService } from './error-handler.service';
import { ImageBuilderService } from './image-builder.service';
import { ImageRunnerService } from './image-runner.service';
import {
  finishRun,
  newStageResult,
  PipelineConfig,
  PipelineOutcome,
  PipelineResult,
  StageExecutionResult,
  stageDir,
} from './pipeline.types';
import { SharedVolume, SharedVolumeService } from './shared-volume.service';
import {
  commandFailure,
  errorMessage,
  FailureStatus,
  PipelineError,
  PipelineStatus,
} from './status';

export interface ExecuteOptions {
  /**
   * Shared volume for this run; defaults to SHARED_VOLUME_NAME. The volume binds
   * `<defaultBaseDir>/<OUTPUT_DIR_NAME>` whatever its name, so runs of one pipeline
   * must not overlap.
   */
  volumeName?: string;
  /** Cancels the command in flight; the run then stops without calling the error handler. */
  signal?: AbortSignal;
}

/**
 * Executes a pipeline: setup, then build and run of every stage in order,
 * then teardown.
 *
 * Each stage's run gets the previous stage's stdout as stdin (the first gets
 * an empty string). The first build or run that fails to start or exits
 * non-zero stops the pipeline and is handed to the ErrorHandlerService.
 * Teardown only happens after every stage succeeded; a teardown failure turns
 * the run into a SetupError.
 *
 * Always resolves: failures come back as `error` next to the partial result.
 */
@Injectable()
export class PipelineExecutorService {
  private readonly logger = new Logger(PipelineExecutorService.name);

  constructor(
    private readonly volumes: SharedVolumeService,
    private readonly builder: ImageBuilderService,
    private readonly runner: ImageRunnerService,
    private readonly errorHandler: ErrorHandlerService,
    @Inject(executorConfig.KEY) private readonly settings: ConfigType<typeof executorConfig>,
  ) {}

  async execute(pipeline: PipelineConfig, options: ExecuteOptions = {}): Promise<PipelineOutcome> {
    const { signal } = options;
    const volumeName = options.volumeName ?? this.settings.sharedVolumeName;
    const result: PipelineResult = {
      name: pipeline.name,
      stageResults: [],
      startTime: new Date(),
      finalTime: null,
      status: '',
    };

    let volume: SharedVolume;
    try {
      volume = await this.volumes.setup(pipeline.defaultBaseDir, volumeName, signal);
    } catch (err) {
      const message = `error in initial setup: ${errorMessage(err)}`;
      this.logger.error(message);
      return finishRun(
        result,
        PipelineStatus.SetupError,
        new PipelineError(PipelineStatus.SetupError, message),
      );
    }

    let previousStdout = '';
    for (const [index, stage] of pipeline.stages.entries()) {
      const ser = newStageResult(stage.name);
      const dir = stageDir(pipeline, stage);
      const id = `${pipeline.name}/${stage.name}`;
      this.logger.log(`Executing pipeline ${id} [${index + 1}/${pipeline.stages.length}]`);

      const build = await this.builder.build(
        id,
        dir,
        mergeEnv(pipeline.defaultBuildEnv, stage.buildEnv),
        signal,
      );
      ser.buildResult = build.result;
      const buildFailure = commandFailure(build, PipelineStatus.BuildError, id);
      if (buildFailure) {
        return this.fail(pipeline, result, ser, PipelineStatus.BuildError, buildFailure, volume, signal);
      }
      this.logger.log(`Image built successfully for ${id}`);

      const run = await this.runner.run(
        id,
        dir,
        previousStdout,
        mergeEnv(pipeline.defaultRunEnv, stage.runEnv),
        volume.name,
        signal,
      );
      ser.runResult = run.result;
      const runFailure = commandFailure(run, PipelineStatus.RunError, id);
      if (runFailure) {
        return this.fail(pipeline, result, ser, PipelineStatus.RunError, runFailure, volume, signal);
      }
      this.logger.log(`Image executed successfully for ${id}`);

      ser.finalTime = new Date();
      result.stageResults.push(ser);
      previousStdout = run.result.stdout;
    }

    try {
      await this.volumes.teardown(volume, signal);
    } catch (err) {
      const message = `error in tear down: ${errorMessage(err)}`;
      this.logger.error(message);
      return finishRun(
        result,
        PipelineStatus.SetupError,
        new PipelineError(PipelineStatus.SetupError, message),
      );
    }

    this.logger.log(`Pipeline ${pipeline.name} finished`);
    return finishRun(result, PipelineStatus.OK, null);
  }

  private async fail(
    pipeline: PipelineConfig,
    result: PipelineResult,
    failed: StageExecutionResult,
    status: FailureStatus,
    message: string,
    volume: SharedVolume,
    signal?: AbortSignal,
  ): Promise<PipelineOutcome> {
    if (signal?.aborted) {
      // The handler would be cancelled too; record the stage and stop.
      failed.finalTime = new Date();
      result.stageResults.push(failed);
      const cancelled = `pipeline ${pipeline.name} cancelled during ${failed.stage}: ${message}`;
      this.logger.warn(cancelled);
      return finishRun(result, status, new PipelineError(status, cancelled));
    }

    return this.errorHandler.handle({
      pipeline,
      result,
      failed,
      status,
      message,
      volumeName: volume.name,
      signal,
    });
  }
}
