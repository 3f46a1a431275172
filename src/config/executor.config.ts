import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const ExecutorEnvSchema = z.object({
  CONTAINER_ENGINE: z.string().min(1).default('docker'),
  SHARED_VOLUME_NAME: z
    .string()
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'must be a valid volume name')
    .default('pipeline-output'),
  OUTPUT_DIR_NAME: z.string().min(1).default('output'),
  // Octal, as chmod takes it.
  OUTPUT_DIR_MODE: z
    .string()
    .regex(/^[0-7]{3,4}$/, 'must be an octal file mode')
    .default('666'),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
});

export interface ExecutorSettings {
  /** Container engine binary, invoked with build/run/volume subcommands. */
  containerEngine: string;
  /** Default shared volume name when a run does not bring its own. */
  sharedVolumeName: string;
  /** Directory under the pipeline base dir that backs the shared volume. */
  outputDirName: string;
  outputDirMode: number;
  /** Per-command timeout; 0 disables it. */
  commandTimeoutMs: number;
}

export function loadExecutorSettings(env: NodeJS.ProcessEnv): ExecutorSettings {
  const parsed = ExecutorEnvSchema.parse(env);
  return {
    containerEngine: parsed.CONTAINER_ENGINE,
    sharedVolumeName: parsed.SHARED_VOLUME_NAME,
    outputDirName: parsed.OUTPUT_DIR_NAME,
    outputDirMode: parseInt(parsed.OUTPUT_DIR_MODE, 8),
    commandTimeoutMs: parsed.COMMAND_TIMEOUT_MS,
  };
}

export const executorConfig = registerAs('executor', () => loadExecutorSettings(process.env));
