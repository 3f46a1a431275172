import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { executorConfig } from './config/executor.config';
import { DatabaseModule } from './database/database.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { RunsModule } from './api/runs/runs.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [executorConfig] }),
    DatabaseModule,
    PipelinesModule,
    RunsModule,
    WorkerModule,
  ],
})
export class AppModule {}
