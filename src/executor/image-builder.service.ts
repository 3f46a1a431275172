import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import path from 'node:path';
import { executorConfig } from '../config/executor.config';
import { CommandOutcome, CommandRunnerService } from './command-runner.service';
import { envFlags } from './environment';

/** Image tag for a stage directory: its last path segment. */
export function imageTag(dir: string): string {
  return path.basename(dir);
}

@Injectable()
export class ImageBuilderService {
  private readonly logger = new Logger(ImageBuilderService.name);

  constructor(
    private readonly runner: CommandRunnerService,
    @Inject(executorConfig.KEY) private readonly settings: ConfigType<typeof executorConfig>,
  ) {}

  /**
   * `<engine> build --build-arg K=V ... -t <tag> .` inside `dir`.
   */
  async build(
    id: string,
    dir: string,
    buildEnv: Readonly<Record<string, string>>,
    signal?: AbortSignal,
  ): Promise<CommandOutcome> {
    this.logger.log(`Building image for ${id}`);
    return this.runner.run({
      command: this.settings.containerEngine,
      args: ['build', ...envFlags('--build-arg', buildEnv), '-t', imageTag(dir), '.'],
      cwd: dir,
      signal,
      timeoutMs: this.settings.commandTimeoutMs,
    });
  }
}
