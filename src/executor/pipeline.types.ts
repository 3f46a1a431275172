import path from 'node:path';
import { PipelineError, PipelineStatus, statusText } from './status';

/**
 * One phase of a data release: a directory holding a Dockerfile.
 * The last path segment of `dir` becomes the image tag.
 */
export interface StageConfig {
  readonly name: string;
  /** Joined with `baseDir` (or the pipeline's default base dir) to locate the build context. */
  readonly dir: string;
  /** Overrides `PipelineConfig.defaultBaseDir` for this stage only. */
  readonly baseDir?: string;
  /** Merged over `PipelineConfig.defaultBuildEnv`, stage keys win. */
  readonly buildEnv: Readonly<Record<string, string>>;
  /** Merged over `PipelineConfig.defaultRunEnv`, stage keys win. */
  readonly runEnv: Readonly<Record<string, string>>;
}

/**
 * Ordered stages plus shared defaults. Stage order is execution order.
 */
export interface PipelineConfig {
  readonly name: string;
  readonly defaultBaseDir: string;
  readonly defaultBuildEnv: Readonly<Record<string, string>>;
  readonly defaultRunEnv: Readonly<Record<string, string>>;
  readonly stages: readonly StageConfig[];
  /** Built and run only when a stage fails; null when none is configured. */
  readonly errorHandler: StageConfig | null;
}

/** Captured record of one external process invocation. */
export interface CmdResult {
  readonly stdin: string;
  readonly stdout: string;
  readonly stderr: string;
  /** Full command line as executed. */
  readonly cmd: string;
  readonly cmdDir: string;
  readonly exitStatus: number;
  /** KEY=VALUE entries visible to the process. */
  readonly env: readonly string[];
}

export interface StageExecutionResult {
  stage: string;
  startTime: Date;
  finalTime: Date | null;
  buildResult: CmdResult | null;
  runResult: CmdResult | null;
}

export interface PipelineResult {
  name: string;
  stageResults: StageExecutionResult[];
  startTime: Date;
  finalTime: Date | null;
  /** Status text (see statusText); empty until the run is finalized. */
  status: string;
}

/** What every pipeline run hands back: the accumulated result, and the error when it failed. */
export interface PipelineOutcome {
  result: PipelineResult;
  error: PipelineError | null;
}

export function newStageResult(stage: string): StageExecutionResult {
  return { stage, startTime: new Date(), finalTime: null, buildResult: null, runResult: null };
}

/** Build context of a stage: its own base dir when set, else the pipeline default. */
export function stageDir(pipeline: PipelineConfig, stage: StageConfig): string {
  return path.join(stage.baseDir || pipeline.defaultBaseDir, stage.dir);
}

/** Stamps the terminal status and end time. Called exactly once per run. */
export function finishRun(
  result: PipelineResult,
  status: PipelineStatus,
  error: PipelineError | null,
): PipelineOutcome {
  result.status = statusText(status);
  result.finalTime = new Date();
  return { result, error };
}
