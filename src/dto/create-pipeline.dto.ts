import { ApiProperty } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'monthly-release' })
  name!: string;

  @ApiProperty({
    description:
      'Pipeline definition: defaultBaseDir, default env maps, ordered stages and an optional errorHandler. Stored in pipelines.config (jsonb).',
    example: {
      defaultBaseDir: '/srv/pipelines/monthly-release',
      defaultRunEnv: { OUTPUT_FOLDER: '/output' },
      stages: [
        { name: 'collect', dir: 'stage-collect', runEnv: { YEAR: '2024' } },
        { name: 'publish', dir: 'stage-publish' },
      ],
      errorHandler: { name: 'report failure', dir: 'error-handler' },
    },
  })
  config!: Record<string, unknown>;
}
