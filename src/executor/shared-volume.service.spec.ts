import { Test } from '@nestjs/testing';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { executorConfig } from '../config/executor.config';
import { CommandRunnerService } from './command-runner.service';
import { SharedVolumeService } from './shared-volume.service';
import { PipelineError } from './status';
import { exited, notStarted, testSettings } from './__fixtures__/outcomes';

describe('SharedVolumeService', () => {
  const commands = { run: jest.fn() };
  let volumes: SharedVolumeService;
  let baseDir: string;

  beforeEach(async () => {
    commands.run.mockReset();
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'shared-volume-'));
    const moduleRef = await Test.createTestingModule({
      providers: [
        SharedVolumeService,
        { provide: CommandRunnerService, useValue: commands },
        { provide: executorConfig.KEY, useValue: testSettings },
      ],
    }).compile();
    volumes = moduleRef.get(SharedVolumeService);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('recreates the output folder and binds a named volume to it', async () => {
    const outputPath = path.join(baseDir, 'output');
    await mkdir(outputPath);
    await writeFile(path.join(outputPath, 'stale.csv'), 'old');
    commands.run.mockResolvedValue(exited(0));

    const volume = await volumes.setup(baseDir, 'release-vol');

    expect(volume).toEqual({ name: 'release-vol', outputPath });
    expect(await readdir(outputPath)).toEqual([]);
    expect(commands.run).toHaveBeenCalledWith({
      command: 'docker',
      args: [
        'volume',
        'create',
        '--driver',
        'local',
        '--opt',
        'type=none',
        '--opt',
        `device=${outputPath}`,
        '--opt',
        'o=bind',
        '--name=release-vol',
      ],
      signal: undefined,
      timeoutMs: 0,
    });
  });

  it('fails setup when the base directory does not exist', async () => {
    const missing = path.join(baseDir, 'missing');

    const setup = volumes.setup(missing, 'release-vol');

    await expect(setup).rejects.toBeInstanceOf(PipelineError);
    await expect(setup).rejects.toMatchObject({ status: 'SetupError' });
    await expect(setup).rejects.toThrow(/^error creating output folder: /);
    expect(commands.run).not.toHaveBeenCalled();
  });

  it('fails setup when the engine rejects the volume', async () => {
    commands.run.mockResolvedValue(exited(1, { stderr: 'volume already exists\n' }));

    await expect(volumes.setup(baseDir, 'release-vol')).rejects.toThrow(
      'error creating volume release-vol: exit status 1 (volume already exists)',
    );
  });

  it('fails setup when the engine cannot be started', async () => {
    commands.run.mockResolvedValue(notStarted('docker volume create'));

    await expect(volumes.setup(baseDir, 'release-vol')).rejects.toThrow(
      'error creating volume release-vol: command was not executed correctly: spawn docker ENOENT',
    );
    expect(existsSync(path.join(baseDir, 'output'))).toBe(true);
  });

  it('removes the volume on teardown', async () => {
    commands.run.mockResolvedValue(exited(0));

    await volumes.teardown({ name: 'release-vol', outputPath: path.join(baseDir, 'output') });

    expect(commands.run).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'docker', args: ['volume', 'rm', '-f', 'release-vol'] }),
    );
  });

  it('fails teardown with a SetupError', async () => {
    commands.run.mockResolvedValue(exited(1));

    await expect(
      volumes.teardown({ name: 'release-vol', outputPath: path.join(baseDir, 'output') }),
    ).rejects.toMatchObject({
      status: 'SetupError',
      message: 'error removing existing volume release-vol: exit status 1',
    });
  });
});
