import { ChildProcess, SpawnOptions } from 'node:child_process';
import { PassThrough } from 'node:stream';
import { CommandAbortedError, CommandRunnerService } from './command-runner.service';
import { EXIT_NOT_STARTED, EXIT_SIGNALED } from './status';

class FakeChild extends ChildProcess {
  readonly input = new PassThrough();
  readonly out = new PassThrough();
  readonly err = new PassThrough();

  constructor() {
    super();
    this.stdin = this.input;
    this.stdout = this.out;
    this.stderr = this.err;
  }
}

class TestRunner extends CommandRunnerService {
  readonly spawned: Array<{ command: string; args: string[]; options: SpawnOptions }> = [];

  constructor(private readonly child: ChildProcess) {
    super();
  }

  protected override spawnProcess(command: string, args: string[], options: SpawnOptions) {
    this.spawned.push({ command, args, options });
    return this.child;
  }
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString('utf8');
}

describe('CommandRunnerService', () => {
  let child: FakeChild;
  let runner: TestRunner;

  beforeEach(() => {
    child = new FakeChild();
    runner = new TestRunner(child);
  });

  it('captures output, input and exit status of a finished process', async () => {
    process.env.RUNNER_TEST_MARKER = 'present';
    const stdin = collect(child.input);

    const pending = runner.run({
      command: 'docker',
      args: ['run', '-i', 'stage-go'],
      cwd: '/srv/stage-go',
      stdin: '{"rows":2}',
    });
    child.emit('spawn');
    child.out.end('first line\nsecond line');
    child.err.end('warning\n');
    await tick();
    child.emit('close', 0, null);

    const { result, error } = await pending;
    delete process.env.RUNNER_TEST_MARKER;

    expect(error).toBeNull();
    expect(result.exitStatus).toBe(0);
    expect(result.stdout).toBe('first line\nsecond line');
    expect(result.stderr).toBe('warning\n');
    expect(result.stdin).toBe('{"rows":2}');
    expect(result.cmd).toBe('docker run -i stage-go');
    expect(result.cmdDir).toBe('/srv/stage-go');
    expect(result.env).toContain('RUNNER_TEST_MARKER=present');
    expect(stdin()).toBe('{"rows":2}');
    expect(runner.spawned[0]).toMatchObject({
      command: 'docker',
      args: ['run', '-i', 'stage-go'],
      options: { cwd: '/srv/stage-go', timeout: undefined },
    });
  });

  it('passes a non-zero exit code through without an error', async () => {
    const pending = runner.run({ command: 'docker', args: ['build', '.'] });
    child.emit('spawn');
    child.err.end('no Dockerfile');
    await tick();
    child.emit('close', 3, null);

    const { result, error } = await pending;
    expect(error).toBeNull();
    expect(result.exitStatus).toBe(3);
    expect(result.stderr).toBe('no Dockerfile');
    expect(result.stdin).toBe('');
  });

  it('reports a process that could not start with the sentinel and an error', async () => {
    const pending = runner.run({ command: 'docker', args: ['build', '.'], cwd: '/missing' });
    child.emit('error', new Error('spawn docker ENOENT'));

    const { result, error } = await pending;
    expect(error?.message).toBe('command was not executed correctly: spawn docker ENOENT');
    expect(result).toEqual({
      stdin: '',
      stdout: '',
      stderr: '',
      cmd: 'docker build .',
      cmdDir: '',
      exitStatus: EXIT_NOT_STARTED,
      env: [],
    });
  });

  it('maps a process killed by a signal to -1', async () => {
    const pending = runner.run({ command: 'docker', args: ['run', 'slow'], timeoutMs: 5000 });
    child.emit('spawn');
    child.emit('close', null, 'SIGTERM');

    const { result, error } = await pending;
    expect(error).toBeNull();
    expect(result.exitStatus).toBe(EXIT_SIGNALED);
    expect(runner.spawned[0].options.timeout).toBe(5000);
  });

  it('returns a CommandAbortedError when cancelled mid-run', async () => {
    const controller = new AbortController();
    const pending = runner.run({ command: 'docker', args: ['run', 'slow'], signal: controller.signal });
    child.emit('spawn');
    controller.abort();
    child.emit('error', new Error('The operation was aborted'));
    child.emit('close', null, 'SIGTERM');

    const { result, error } = await pending;
    expect(error).toBeInstanceOf(CommandAbortedError);
    expect(error?.message).toBe('command was cancelled: docker run slow');
    expect(result.exitStatus).toBe(EXIT_SIGNALED);
  });

  it('does not spawn when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const { result, error } = await runner.run({
      command: 'docker',
      args: ['build', '.'],
      signal: controller.signal,
    });

    expect(runner.spawned).toHaveLength(0);
    expect(result.exitStatus).toBe(EXIT_NOT_STARTED);
    expect(error?.message).toBe(
      'command was not executed correctly: command was cancelled: docker build .',
    );
  });
});

describe('CommandRunnerService with real processes', () => {
  const runner = new CommandRunnerService();

  it('pipes stdin through to stdout', async () => {
    const { result, error } = await runner.run({ command: 'cat', args: [], stdin: 'a,b\n1,2\n' });

    expect(error).toBeNull();
    expect(result.exitStatus).toBe(0);
    expect(result.stdout).toBe('a,b\n1,2\n');
    expect(result.stdin).toBe('a,b\n1,2\n');
    expect(result.cmd).toBe('cat');
  });

  it('passes the exit code of a failing process through', async () => {
    const { result, error } = await runner.run({
      command: 'sh',
      args: ['-c', 'echo broken >&2; exit 3'],
    });

    expect(error).toBeNull();
    expect(result.exitStatus).toBe(3);
    expect(result.stderr).toBe('broken\n');
  });

  it('reports a missing binary as not started', async () => {
    const { result, error } = await runner.run({
      command: 'no-such-container-engine',
      args: ['build', '.'],
    });

    expect(result.exitStatus).toBe(EXIT_NOT_STARTED);
    expect(result.cmd).toBe('no-such-container-engine build .');
    expect(error?.message).toBe(
      'command was not executed correctly: spawn no-such-container-engine ENOENT',
    );
  });
});
