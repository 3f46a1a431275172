import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { executorConfig } from '../config/executor.config';
import { PipelinesModule } from '../api/pipelines/pipelines.module';
import { ExecutorModule } from '../executor/executor.module';
import { QueueModule } from '../queue/queue.module';
import { WorkerService } from './worker.service';

@Module({
  imports: [ConfigModule.forFeature(executorConfig), PipelinesModule, ExecutorModule, QueueModule],
  providers: [WorkerService],
  exports: [WorkerService],
})
export class WorkerModule {}
