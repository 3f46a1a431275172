import { Module } from '@nestjs/common';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { QueueModule } from '../../queue/queue.module';

@Module({
  imports: [PipelinesModule, QueueModule],
  controllers: [RunsController],
  providers: [RunsService],
})
export class RunsModule {}
