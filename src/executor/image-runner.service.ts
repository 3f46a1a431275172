import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { executorConfig } from '../config/executor.config';
import { CommandOutcome, CommandRunnerService } from './command-runner.service';
import { envFlags } from './environment';
import { imageTag } from './image-builder.service';

/** Mount point of the shared volume inside every stage container. */
export const SHARED_VOLUME_MOUNT = '/output';

@Injectable()
export class ImageRunnerService {
  private readonly logger = new Logger(ImageRunnerService.name);

  constructor(
    private readonly runner: CommandRunnerService,
    @Inject(executorConfig.KEY) private readonly settings: ConfigType<typeof executorConfig>,
  ) {}

  /**
   * `<engine> run -i -v <volume>:/output --rm --env K=V ... <tag>` inside `dir`,
   * with the previous stage's stdout as stdin.
   */
  async run(
    id: string,
    dir: string,
    previousStdout: string,
    runEnv: Readonly<Record<string, string>>,
    volumeName: string,
    signal?: AbortSignal,
  ): Promise<CommandOutcome> {
    this.logger.log(`Running image for ${id}`);
    return this.runner.run({
      command: this.settings.containerEngine,
      args: [
        'run',
        '-i',
        '-v',
        `${volumeName}:${SHARED_VOLUME_MOUNT}`,
        '--rm',
        ...envFlags('--env', runEnv),
        imageTag(dir),
      ],
      cwd: dir,
      stdin: previousStdout,
      signal,
      timeoutMs: this.settings.commandTimeoutMs,
    });
  }
}
