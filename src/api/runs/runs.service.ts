import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import type { SerializedPipelineResult } from '../../executor/stage-result.serializer';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunQueueService } from '../../queue/run-queue.service';

export class PipelineNotFoundError extends Error {
  constructor(pipelineId: string) {
    super(`Pipeline not found: ${pipelineId}`);
    this.name = 'PipelineNotFoundError';
  }
}

/**
 * trigger pipeline runs and read their results.
 */
@Injectable()
export class RunsService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly runQueue: RunQueueService,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    const repo = this.dataSource.getRepository(PipelineRun);
    return repo.find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  // Get one run by id, with its result once finished
  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
    });
  }

  // Serialized PipelineResult of a finished run; null if unknown or not finished yet.
  async findResult(runId: string): Promise<SerializedPipelineResult | null> {
    const run = await this.findOne(runId);
    return run?.result ?? null;
  }

  // Queue a run; a worker picks it up and executes it.
  async triggerRun(pipelineId: string, triggerType = 'manual'): Promise<PipelineRun> {
    const pipeline = await this.pipelinesService.findOne(pipelineId);
    if (!pipeline) throw new PipelineNotFoundError(pipelineId);
    return this.runQueue.enqueueRun(pipeline.id, triggerType);
  }
}
