import type { ExecutorSettings } from '../../config/executor.config';
import type { CommandOutcome } from '../command-runner.service';
import type { CmdResult } from '../pipeline.types';
import { EXIT_NOT_STARTED } from '../status';

export const testSettings: ExecutorSettings = {
  containerEngine: 'docker',
  sharedVolumeName: 'test-volume',
  outputDirName: 'output',
  outputDirMode: 0o755,
  commandTimeoutMs: 0,
};

export function cmdResult(fields: Partial<CmdResult> = {}): CmdResult {
  return {
    stdin: '',
    stdout: '',
    stderr: '',
    cmd: 'docker',
    cmdDir: '',
    exitStatus: 0,
    env: [],
    ...fields,
  };
}

export function exited(exitStatus: number, fields: Partial<CmdResult> = {}): CommandOutcome {
  return { result: cmdResult({ ...fields, exitStatus }), error: null };
}

export function notStarted(cmd: string, reason = 'spawn docker ENOENT'): CommandOutcome {
  return {
    result: cmdResult({ cmd, exitStatus: EXIT_NOT_STARTED }),
    error: new Error(`command was not executed correctly: ${reason}`),
  };
}
