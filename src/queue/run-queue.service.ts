import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import type { PipelineOutcome } from '../executor/pipeline.types';
import { serializePipelineResult } from '../executor/stage-result.serializer';

const CLAIM_LOCK_KEY = 'pipeline_runs:claim';

const CLAIM_NEXT_RUN_SQL = `
  UPDATE pipeline_runs
  SET claimed_by = $1,
      started_at = NOW(),
      status = 'running'
  WHERE id = (
    SELECT candidate.id
    FROM pipeline_runs candidate
    WHERE candidate.status = 'pending'
      AND NOT EXISTS (
        SELECT 1
        FROM pipeline_runs active
        WHERE active.pipeline_id = candidate.pipeline_id
          AND active.status = 'running'
      )
    ORDER BY candidate.created_at ASC
    FOR UPDATE SKIP LOCKED
    LIMIT 1
  )
  RETURNING id, pipeline_id;
  `;

/** The postgres driver returns UPDATE ... RETURNING as [rows, rowCount]. */
function firstReturnedRow(result: unknown): unknown {
  if (!Array.isArray(result)) return undefined;
  const [first] = result;
  return Array.isArray(first) ? first[0] : first;
}

/** A run a worker has taken ownership of. */
export interface ClaimedRun {
  id: string;
  pipeline_id: string;
}

/**
 * pipeline_runs doubles as the queue: 'pending' rows are claimed one at a time
 * with FOR UPDATE SKIP LOCKED, so concurrent workers never pick the same run.
 *
 * Runs of one pipeline share its output directory on the host, so a pending
 * run is only claimable while no other run of the same pipeline is 'running'.
 */
@Injectable()
export class RunQueueService {
  constructor(private readonly dataSource: DataSource) {}

  async enqueueRun(pipelineId: string, triggerType = 'manual'): Promise<PipelineRun> {
    const repo = this.dataSource.getRepository(PipelineRun);
    const run = repo.create({ pipeline_id: pipelineId, trigger_type: triggerType, status: 'pending' });
    return repo.save(run);
  }

  /** Claims the oldest pending run and marks it running; null if none is pending. */
  async claimNextRun(workerId: string): Promise<ClaimedRun | null> {
    const result: unknown = await this.dataSource.transaction(async (manager) => {
      // Held until commit: the next claimer sees this claim's 'running' row.
      await manager.query(`SELECT pg_advisory_xact_lock(hashtext($1))`, [CLAIM_LOCK_KEY]);
      return manager.query(CLAIM_NEXT_RUN_SQL, [workerId]);
    });

    return this.mapRowToClaimedRun(firstReturnedRow(result));
  }

  async setVolume(runId: string, volumeName: string): Promise<void> {
    await this.dataSource.getRepository(PipelineRun).update(runId, { volume_name: volumeName });
  }

  /** Stores the finished PipelineResult with its terminal status and error. */
  async completeRun(runId: string, outcome: PipelineOutcome): Promise<void> {
    const { result, error } = outcome;
    await this.dataSource.getRepository(PipelineRun).update(runId, {
      status: result.status,
      result: serializePipelineResult(result),
      error_message: error ? error.message : null,
      started_at: result.startTime,
      completed_at: result.finalTime ?? new Date(),
    });
  }

  /** For runs that never reached the executor (e.g. an unreadable definition). */
  async failRun(runId: string, status: string, message: string): Promise<void> {
    await this.dataSource.getRepository(PipelineRun).update(runId, {
      status,
      error_message: message,
      completed_at: new Date(),
    });
  }

  private mapRowToClaimedRun(row: unknown): ClaimedRun | null {
    if (typeof row !== 'object' || row === null) return null;
    if (!('id' in row) || !('pipeline_id' in row)) return null;
    return {
      id: String(row.id),
      pipeline_id: String(row.pipeline_id),
    };
  }
}
