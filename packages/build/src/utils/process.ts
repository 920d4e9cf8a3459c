/**
 * External process execution
 */

import { SpawnOptions, spawn } from 'child_process';
import { BuildError, BuildErrorCode } from '../types.js';
import { ExecutionLog } from './execution-log.js';
import { createLogger } from './logger.js';

const logger = createLogger('process');

/** One blocking invocation of an external tool */
export interface ProcessInvocation {
  /** Executable followed by its arguments */
  argv: readonly string[];
  /** Complete environment of the child */
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Pass arguments to cmd.exe unquoted (windowsVerbatimArguments) */
  verbatim?: boolean;
}

export interface CaptureResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external tools; the orchestrator never touches child_process directly
 */
export interface ProcessRunner {
  /** Run with output streamed to the execution log; resolves to the exit code */
  run(invocation: ProcessInvocation): Promise<number>;
  /** Run and collect output without logging it */
  capture(invocation: ProcessInvocation): Promise<CaptureResult>;
}

/**
 * Splits a byte stream into lines across chunk boundaries
 */
class LineSplitter {
  private pending = '';

  constructor(private readonly onLine: (line: string) => void) {}

  push(chunk: Buffer | string): void {
    const lines = (this.pending + chunk.toString()).split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    lines.forEach(line => this.onLine(line));
  }

  flush(): void {
    if (this.pending !== '') {
      this.onLine(this.pending);
      this.pending = '';
    }
  }
}

/**
 * spawn() options for an invocation with piped output
 */
export function spawnOptionsFor(invocation: ProcessInvocation): SpawnOptions {
  return {
    cwd: invocation.cwd,
    env: invocation.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsVerbatimArguments: invocation.verbatim ?? false
  };
}

/**
 * child_process based runner
 */
export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly log?: ExecutionLog) {}

  async run(invocation: ProcessInvocation): Promise<number> {
    const [command, ...args] = invocation.argv;
    if (command === undefined) {
      throw new BuildError(BuildErrorCode.ProcessSpawnFailed, 'Empty command');
    }

    this.log?.command(invocation.argv, invocation.cwd);
    logger.debug(`Running ${command} in ${invocation.cwd}`);

    return new Promise<number>((resolve, reject) => {
      const child = spawn(command, args, spawnOptionsFor(invocation));

      const record = (line: string): void => {
        if (this.log) {
          this.log.line(line);
        } else {
          logger.debug(line);
        }
      };
      const stdout = new LineSplitter(record);
      const stderr = new LineSplitter(record);

      child.stdout?.on('data', (data: Buffer) => stdout.push(data));
      child.stderr?.on('data', (data: Buffer) => stderr.push(data));

      child.on('error', error => {
        reject(
          new BuildError(BuildErrorCode.ProcessSpawnFailed, `${command}: ${error.message}`, {
            cause: error
          })
        );
      });

      child.on('close', code => {
        stdout.flush();
        stderr.flush();
        resolve(code ?? 1);
      });
    });
  }

  async capture(invocation: ProcessInvocation): Promise<CaptureResult> {
    const [command, ...args] = invocation.argv;
    if (command === undefined) {
      throw new BuildError(BuildErrorCode.ProcessSpawnFailed, 'Empty command');
    }

    return new Promise<CaptureResult>((resolve, reject) => {
      const child = spawn(command, args, spawnOptionsFor(invocation));

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', error => {
        reject(
          new BuildError(BuildErrorCode.ProcessSpawnFailed, `${command}: ${error.message}`, {
            cause: error
          })
        );
      });

      child.on('close', code => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}
