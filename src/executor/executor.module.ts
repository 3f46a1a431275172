import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { executorConfig } from '../config/executor.config';
import { CommandRunnerService } from './command-runner.service';
import { ErrorHandlerService } from './error-handler.service';
import { ImageBuilderService } from './image-builder.service';
import { ImageRunnerService } from './image-runner.service';
import { PipelineExecutorService } from './pipeline-executor.service';
import { SharedVolumeService } from './shared-volume.service';

@Module({
  imports: [ConfigModule.forFeature(executorConfig)],
  providers: [
    CommandRunnerService,
    ImageBuilderService,
    ImageRunnerService,
    SharedVolumeService,
    ErrorHandlerService,
    PipelineExecutorService,
  ],
  exports: [PipelineExecutorService],
})
export class ExecutorModule {}
