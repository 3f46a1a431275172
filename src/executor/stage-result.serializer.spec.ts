import { newStageResult, PipelineResult } from './pipeline.types';
import { serializePipelineResult, serializeStageResult } from './stage-result.serializer';
import { cmdResult } from './__fixtures__/outcomes';

describe('stage result serializer', () => {
  const start = new Date('2024-05-01T10:00:00.000Z');
  const end = new Date('2024-05-01T10:00:05.000Z');

  it('writes a stage with only its build half', () => {
    const ser = newStageResult('collect');
    ser.startTime = start;
    ser.buildResult = cmdResult({
      cmd: 'docker build --build-arg A=1 -t stage-collect .',
      cmdDir: '/srv/stage-collect',
      stderr: 'failed',
      exitStatus: 1,
      env: ['PATH=/usr/bin'],
    });

    expect(serializeStageResult(ser)).toEqual({
      stage: 'collect',
      start: '2024-05-01T10:00:00.000Z',
      end: null,
      buildResult: {
        stdin: '',
        stdout: '',
        stderr: 'failed',
        cmd: 'docker build --build-arg A=1 -t stage-collect .',
        cmdDir: '/srv/stage-collect',
        status: 1,
        env: ['PATH=/usr/bin'],
      },
      runResult: null,
    });
  });

  it('writes a whole pipeline result', () => {
    const ser = newStageResult('collect');
    ser.startTime = start;
    ser.finalTime = end;
    ser.buildResult = cmdResult();
    ser.runResult = cmdResult({ stdout: 'a,b\n' });
    const result: PipelineResult = {
      name: 'tutorial',
      stageResults: [ser],
      startTime: start,
      finalTime: end,
      status: 'OK',
    };

    const serialized = serializePipelineResult(result);

    expect(serialized.name).toBe('tutorial');
    expect(serialized.start).toBe('2024-05-01T10:00:00.000Z');
    expect(serialized.final).toBe('2024-05-01T10:00:05.000Z');
    expect(serialized.status).toBe('OK');
    expect(serialized.stageResult).toHaveLength(1);
    expect(serialized.stageResult[0].end).toBe('2024-05-01T10:00:05.000Z');
    expect(serialized.stageResult[0].runResult?.stdout).toBe('a,b\n');
  });
});
