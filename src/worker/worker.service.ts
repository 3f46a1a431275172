import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { executorConfig } from '../config/executor.config';
import { PipelinesService } from '../api/pipelines/pipelines.service';
import { toPipelineConfig } from '../executor/pipeline-config.schema';
import { PipelineExecutorService } from '../executor/pipeline-executor.service';
import type { PipelineConfig } from '../executor/pipeline.types';
import { PipelineStatus, errorMessage, statusText } from '../executor/status';
import { RunQueueService } from '../queue/run-queue.service';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker main loop:
 * - claim the next pending run
 * - execute it with its own shared volume, store the PipelineResult
 * - when nothing is pending, sleep (RUN_WORKER_LOOP=true only)
 *
 * Runs execute one at a time; shutdown aborts the command in flight.
 */
@Injectable()
export class WorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkerService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;

  private readonly workerId =
    process.env.WORKER_ID || process.env.HOSTNAME || `worker-${randomUUID().slice(0, 8)}`;

  constructor(
    private readonly runQueue: RunQueueService,
    private readonly pipelines: PipelinesService,
    private readonly executor: PipelineExecutorService,
    @Inject(executorConfig.KEY) private readonly settings: ConfigType<typeof executorConfig>,
  ) {}

  onModuleInit(): void {
    if (process.env.RUN_WORKER_LOOP !== 'true') return;
    this.logger.log(`Worker ${this.workerId} started`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(2000)]);
    }
  }

  /**
   * Claims and executes one run. Returns false when nothing was pending.
   */
  async processNextRun(): Promise<boolean> {
    const run = await this.runQueue.claimNextRun(this.workerId);
    if (!run) return false;

    const pipeline = await this.pipelines.findOne(run.pipeline_id);
    if (!pipeline) {
      await this.runQueue.failRun(
        run.id,
        statusText(PipelineStatus.SetupError),
        `pipeline ${run.pipeline_id} no longer exists`,
      );
      return true;
    }

    let config: PipelineConfig;
    try {
      config = toPipelineConfig(pipeline.name, pipeline.config);
    } catch (err) {
      await this.runQueue.failRun(
        run.id,
        statusText(PipelineStatus.SetupError),
        `invalid definition for pipeline ${pipeline.name}: ${errorMessage(err)}`,
      );
      return true;
    }

    const volumeName = `${this.settings.sharedVolumeName}-${run.id.slice(0, 8)}`;
    await this.runQueue.setVolume(run.id, volumeName);

    this.logger.log(`Run ${run.id}: executing pipeline ${pipeline.name}`);
    const outcome = await this.executor.execute(config, { volumeName, signal: this.abort.signal });
    try {
      await this.runQueue.completeRun(run.id, outcome);
    } catch (err) {
      await this.storeFallback(run.id, outcome.result.status, err);
    }
    this.logger.log(`Run ${run.id}: ${outcome.result.status}`);
    return true;
  }

  /**
   * Keeps a run whose result could not be stored from staying 'running'.
   * Stale claims are never reclaimed, so a second failure is rethrown with the run id.
   */
  private async storeFallback(runId: string, status: string, cause: unknown): Promise<void> {
    const message = `result not stored: ${errorMessage(cause)}`;
    this.logger.error(`Run ${runId}: ${message}`);
    try {
      await this.runQueue.failRun(runId, status, message);
    } catch (err) {
      throw new Error(`run ${runId} is left running: ${errorMessage(err)}`);
    }
  }

  private async runLoop(): Promise<void> {
    const pollMs = 1000;

    while (!this.abort.signal.aborted) {
      try {
        const processed = await this.processNextRun();
        if (!processed) await sleep(pollMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Worker loop error: ${errorMessage(err)}`);
        await sleep(pollMs);
      }
    }
  }
}
