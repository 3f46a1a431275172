import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { executorConfig } from '../config/executor.config';
import { CommandRunnerService } from './command-runner.service';
import { errorMessage, PipelineError, PipelineStatus } from './status';

/** Host-backed volume every stage run mounts at /output. */
export interface SharedVolume {
  name: string;
  outputPath: string;
}

/**
 * Creates and removes the writable area shared by all stages of a run.
 * Failures are fatal: both operations throw a SetupError and leave any
 * partial state in place.
 */
@Injectable()
export class SharedVolumeService {
  private readonly logger = new Logger(SharedVolumeService.name);

  constructor(
    private readonly runner: CommandRunnerService,
    @Inject(executorConfig.KEY) private readonly settings: ConfigType<typeof executorConfig>,
  ) {}

  async setup(baseDir: string, volumeName: string, signal?: AbortSignal): Promise<SharedVolume> {
    const outputPath = path.join(baseDir, this.settings.outputDirName);

    try {
      await rm(outputPath, { recursive: true, force: true });
    } catch (err) {
      throw new PipelineError(
        PipelineStatus.SetupError,
        `error removing existing output folder: ${errorMessage(err)}`,
      );
    }

    try {
      await mkdir(outputPath, { mode: this.settings.outputDirMode });
    } catch (err) {
      throw new PipelineError(
        PipelineStatus.SetupError,
        `error creating output folder: ${errorMessage(err)}`,
      );
    }

    await this.engine(
      [
        'volume',
        'create',
        '--driver',
        'local',
        '--opt',
        'type=none',
        '--opt',
        `device=${outputPath}`,
        '--opt',
        'o=bind',
        `--name=${volumeName}`,
      ],
      `error creating volume ${volumeName}`,
      signal,
    );

    this.logger.log(`Volume ${volumeName} bound to ${outputPath}`);
    return { name: volumeName, outputPath };
  }

  async teardown(volume: SharedVolume, signal?: AbortSignal): Promise<void> {
    await this.engine(
      ['volume', 'rm', '-f', volume.name],
      `error removing existing volume ${volume.name}`,
      signal,
    );
    this.logger.log(`Volume ${volume.name} removed`);
  }

  private async engine(args: string[], failure: string, signal?: AbortSignal): Promise<void> {
    const { result, error } = await this.runner.run({
      command: this.settings.containerEngine,
      args,
      signal,
      timeoutMs: this.settings.commandTimeoutMs,
    });
    if (error) {
      throw new PipelineError(PipelineStatus.SetupError, `${failure}: ${error.message}`);
    }
    if (result.exitStatus !== 0) {
      const detail = result.stderr.trim();
      throw new PipelineError(
        PipelineStatus.SetupError,
        `${failure}: exit status ${result.exitStatus}${detail ? ` (${detail})` : ''}`,
      );
    }
  }
}
