import type { CmdResult, PipelineResult, StageExecutionResult } from './pipeline.types';

/*
 * Interchange form of run results. Field names are what error-handler images
 * read from stdin and what is persisted in pipeline_runs.result.
 */

export interface SerializedCmdResult {
  stdin: string;
  stdout: string;
  stderr: string;
  cmd: string;
  cmdDir: string;
  status: number;
  env: string[];
}

export interface SerializedStageResult {
  stage: string;
  start: string;
  end: string | null;
  buildResult: SerializedCmdResult | null;
  runResult: SerializedCmdResult | null;
}

export interface SerializedPipelineResult {
  name: string;
  stageResult: SerializedStageResult[];
  start: string;
  final: string | null;
  status: string;
}

export function serializeCmdResult(result: CmdResult): SerializedCmdResult {
  return {
    stdin: result.stdin,
    stdout: result.stdout,
    stderr: result.stderr,
    cmd: result.cmd,
    cmdDir: result.cmdDir,
    status: result.exitStatus,
    env: [...result.env],
  };
}

export function serializeStageResult(ser: StageExecutionResult): SerializedStageResult {
  return {
    stage: ser.stage,
    start: ser.startTime.toISOString(),
    end: ser.finalTime ? ser.finalTime.toISOString() : null,
    buildResult: ser.buildResult ? serializeCmdResult(ser.buildResult) : null,
    runResult: ser.runResult ? serializeCmdResult(ser.runResult) : null,
  };
}

export function serializePipelineResult(result: PipelineResult): SerializedPipelineResult {
  return {
    name: result.name,
    stageResult: result.stageResults.map(serializeStageResult),
    start: result.startTime.toISOString(),
    final: result.finalTime ? result.finalTime.toISOString() : null,
    status: result.status,
  };
}
