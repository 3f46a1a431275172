import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import {
  PipelineDefinition,
  PipelineDefinitionSchema,
} from '../../executor/pipeline-config.schema';

export class InvalidPipelineDefinitionError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid pipeline definition: ${issues.join('; ')}`);
    this.name = 'InvalidPipelineDefinitionError';
  }
}

/**
 * Parses a definition, filling in defaults (empty env maps).
 * @throws InvalidPipelineDefinitionError
 */
export function parseDefinition(config: unknown): PipelineDefinition {
  const parsed = PipelineDefinitionSchema.safeParse(config);
  if (!parsed.success) {
    throw new InvalidPipelineDefinitionError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

@Injectable()
export class PipelinesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  async create(dto: { name: string; config: unknown }): Promise<Pipeline> {
    const pipeline = this.repo.create({ name: dto.name, config: parseDefinition(dto.config) });
    return this.repo.save(pipeline);
  }

  async update(id: string, dto: Partial<{ name: string; config: unknown }>): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new Error('Pipeline not found');
    if (dto.name !== undefined) pipeline.name = dto.name;
    if (dto.config !== undefined) pipeline.config = parseDefinition(dto.config);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new Error('Pipeline not found');
  }
}
