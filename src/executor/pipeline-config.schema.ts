import { z } from 'zod';
import type { PipelineConfig, StageConfig } from './pipeline.types';

const EnvSchema = z.record(z.string(), z.string()).default({});

export const StageDefinitionSchema = z.object({
  name: z.string().min(1),
  dir: z.string().min(1),
  baseDir: z.string().min(1).optional(),
  buildEnv: EnvSchema,
  runEnv: EnvSchema,
});
export type StageDefinition = z.infer<typeof StageDefinitionSchema>;

/**
 * Stored form of a pipeline (pipelines.config). The pipeline's name lives in
 * its own column and is joined in by toPipelineConfig().
 */
export const PipelineDefinitionSchema = z.object({
  defaultBaseDir: z.string().min(1),
  defaultBuildEnv: EnvSchema,
  defaultRunEnv: EnvSchema,
  stages: z.array(StageDefinitionSchema).min(1),
  errorHandler: StageDefinitionSchema.nullable().optional(),
});
export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;

function toStageConfig(stage: StageDefinition): StageConfig {
  return {
    name: stage.name,
    dir: stage.dir,
    baseDir: stage.baseDir,
    buildEnv: stage.buildEnv,
    runEnv: stage.runEnv,
  };
}

/**
 * @throws ZodError when `raw` is not a valid definition
 */
export function toPipelineConfig(name: string, raw: unknown): PipelineConfig {
  const definition = PipelineDefinitionSchema.parse(raw);
  return {
    name,
    defaultBaseDir: definition.defaultBaseDir,
    defaultBuildEnv: definition.defaultBuildEnv,
    defaultRunEnv: definition.defaultRunEnv,
    stages: definition.stages.map(toStageConfig),
    errorHandler: definition.errorHandler ? toStageConfig(definition.errorHandler) : null,
  };
}
