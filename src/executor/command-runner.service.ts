import { Injectable, Logger } from '@nestjs/common';
import { ChildProcess, spawn, SpawnOptions } from 'node:child_process';
import type { CmdResult } from './pipeline.types';
import { EXIT_NOT_STARTED, EXIT_SIGNALED } from './status';

export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Written to the process' stdin, which is then closed. */
  stdin?: string;
  signal?: AbortSignal;
  /** Kill the process after this many ms; 0 or undefined means no limit. */
  timeoutMs?: number;
}

/**
 * `error` is set when the process could not be started (result then only
 * carries `cmd` and EXIT_NOT_STARTED) or when it was cancelled through the
 * signal. A process that ran and exited non-zero is not an error here: the
 * caller classifies `result.exitStatus`.
 */
export interface CommandOutcome {
  result: CmdResult;
  error: Error | null;
}

export class CommandAbortedError extends Error {
  constructor(cmd: string) {
    super(`command was cancelled: ${cmd}`);
    this.name = 'CommandAbortedError';
  }
}

function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

function environSnapshot(): string[] {
  return Object.entries(process.env).flatMap(([key, value]) =>
    value === undefined ? [] : [`${key}=${value}`],
  );
}

function notStarted(cmd: string, err: Error): CommandOutcome {
  return {
    result: { stdin: '', stdout: '', stderr: '', cmd, cmdDir: '', exitStatus: EXIT_NOT_STARTED, env: [] },
    error: new Error(`command was not executed correctly: ${err.message}`),
  };
}

/**
 * Runs one external command to completion, buffering its whole output.
 * Output lines are also echoed to the logger at verbose level.
 */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  async run(invocation: CommandSpec): Promise<CommandOutcome> {
    const { timeoutMs } = invocation;
    const cmd = [invocation.command, ...invocation.args].join(' ');
    this.logger.debug(`$ ${cmd}`);

    if (invocation.signal?.aborted) {
      return notStarted(cmd, new CommandAbortedError(cmd));
    }

    return new Promise<CommandOutcome>((resolve) => {
      let child: ChildProcess;
      try {
        child = this.spawnProcess(invocation.command, [...invocation.args], {
          cwd: invocation.cwd,
          env: process.env,
          signal: invocation.signal,
          timeout: timeoutMs && timeoutMs > 0 ? timeoutMs : undefined,
          stdio: 'pipe',
        });
      } catch (err) {
        resolve(notStarted(cmd, err instanceof Error ? err : new Error(String(err))));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const stdoutLines = createLineBuffer((line) => this.logger.verbose(line));
      const stderrLines = createLineBuffer((line) => this.logger.verbose(`[stderr] ${line}`));
      let spawned = false;
      let settled = false;

      const settle = (outcome: CommandOutcome) => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      child.stdout?.on('data', (buf: Buffer) => {
        stdout.push(buf);
        stdoutLines.write(buf.toString('utf8'));
      });
      child.stderr?.on('data', (buf: Buffer) => {
        stderr.push(buf);
        stderrLines.write(buf.toString('utf8'));
      });
      // A process may exit without draining its input (EPIPE).
      child.stdin?.on('error', (err) => {
        this.logger.debug(`stdin not consumed by ${cmd}: ${err.message}`);
      });

      child.once('spawn', () => {
        spawned = true;
        child.stdin?.end(invocation.stdin ?? '');
      });

      child.on('error', (err) => {
        if (!spawned) {
          settle(notStarted(cmd, err));
          return;
        }
        // Raised after spawn on cancellation; 'close' follows and settles.
        if (!invocation.signal?.aborted) this.logger.warn(`${cmd}: ${err.message}`);
      });

      child.on('close', (code) => {
        if (!spawned) return;
        stdoutLines.flush();
        stderrLines.flush();

        const result: CmdResult = {
          stdin: invocation.stdin ?? '',
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          cmd,
          cmdDir: invocation.cwd ?? '',
          exitStatus: code ?? EXIT_SIGNALED,
          env: environSnapshot(),
        };
        settle({ result, error: invocation.signal?.aborted ? new CommandAbortedError(cmd) : null });
      });
    });
  }

  protected spawnProcess(command: string, args: string[], options: SpawnOptions): ChildProcess {
    return spawn(command, args, options);
  }
}
