import { Module } from '@nestjs/common';
import { RunQueueService } from './run-queue.service';

@Module({
  providers: [RunQueueService],
  exports: [RunQueueService],
})
export class QueueModule {}
