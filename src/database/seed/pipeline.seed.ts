import { Pipeline } from '../entities/pipeline.entity';

/**
 * Sample pipeline inserted on first app start when no pipelines exist.
 * Stage directories are resolved under defaultBaseDir and must hold a Dockerfile.
 */
export const PIPELINE_SEED: Partial<Pipeline>[] = [
  {
    name: 'tutorial',
    config: {
      defaultBaseDir: '/srv/pipelines/tutorial',
      defaultBuildEnv: {},
      defaultRunEnv: { OUTPUT_FOLDER: '/output' },
      stages: [
        { name: 'collect', dir: 'stage-collect', runEnv: { YEAR: '2024', MONTH: '1' } },
        { name: 'convert to csv', dir: 'stage-python' },
      ],
      errorHandler: { name: 'report failure', dir: 'error-handler' },
    },
  },
];
