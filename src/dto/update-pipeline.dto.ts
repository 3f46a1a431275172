import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'monthly-release' })
  name?: string;

  @ApiPropertyOptional({
    description: 'Replaces the whole pipeline definition. Stored in pipelines.config (jsonb).',
  })
  config?: Record<string, unknown>;
}
