import { Controller, Get, Post, Body, Param, Query, NotFoundException } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelineNotFoundError, RunsService } from './runs.service';
import { TriggerRunDto } from '../../dto/trigger-run.dto';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id') id: string) {
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  @Get(':id/result')
  @ApiOperation({ summary: 'Get the PipelineResult of a finished run' })
  async findResult(@Param('id') id: string) {
    const result = await this.runsService.findResult(id);
    if (!result) throw new NotFoundException('Run not found or not finished');
    return result;
  }

  // queue a pipeline run
  @Post()
  @ApiOperation({ summary: 'Queue a pipeline run' })
  async trigger(@Body() body: TriggerRunDto) {
    try {
      return await this.runsService.triggerRun(body.pipelineId, body.triggerType ?? 'manual');
    } catch (err) {
      if (err instanceof PipelineNotFoundError) throw new NotFoundException(err.message);
      throw err;
    }
  }
}
