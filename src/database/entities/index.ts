/**
 * Database entities: pipelines, pipeline_runs.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
