/**
 * Plain-text execution log for external tool output
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { Verbosity } from '../types.js';
import { LogOutput } from './logger.js';

export interface ExecutionLogOptions {
  /** File receiving every line */
  logFile: string;
  verbosity: Verbosity;
  /** Echo only every Nth line to the console */
  discard?: number;
  /** Number of trailing lines kept for failure reports */
  tail?: number;
  /** Console sink */
  console?: LogOutput;
}

/**
 * Quote a token for display when it contains whitespace or quotes
 */
export function quoteArg(arg: string): string {
  if (arg === '' || /[\s"']/.test(arg)) {
    return `"${arg.replace(/"/g, '\\"')}"`;
  }
  return arg;
}

/**
 * Render an argv the way a user would type it
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}

/**
 * Writes every line of tool output to the log file and echoes a shaped
 * subset of it to the console. The full log is always kept.
 */
export class ExecutionLog {
  private readonly console: LogOutput;
  private readonly recent: string[] = [];
  private echoed = 0;

  constructor(private readonly options: ExecutionLogOptions) {
    this.console = options.console ?? process.stdout;
  }

  get path(): string {
    return this.options.logFile;
  }

  /**
   * Create (or truncate) the log file
   */
  open(): void {
    mkdirSync(dirname(this.options.logFile), { recursive: true });
    writeFileSync(this.options.logFile, '');
  }

  /**
   * Record a command about to be executed
   */
  command(argv: readonly string[], cwd: string): void {
    const line = `[${cwd}]> ${formatCommand(argv)}`;
    appendFileSync(this.options.logFile, line + '\n');
    if (this.options.verbosity !== 'silent') {
      this.console.write(line + '\n');
    }
  }

  /**
   * Record one line of tool output
   */
  line(text: string): void {
    appendFileSync(this.options.logFile, text + '\n');
    this.remember(text);

    if (this.options.verbosity === 'silent') {
      return;
    }

    this.echoed += 1;
    const discard = this.options.discard;
    if (discard === undefined || this.echoed % discard === 0) {
      this.console.write(text + '\n');
    }
  }

  /**
   * Last lines of output, up to the configured tail size
   */
  tailLines(): string[] {
    return [...this.recent];
  }

  /**
   * Print the retained tail to the console after a failure
   */
  printTail(): void {
    if (this.recent.length === 0) {
      return;
    }
    this.console.write(`Last ${this.recent.length} lines of ${this.options.logFile}:\n`);
    for (const text of this.recent) {
      this.console.write(text + '\n');
    }
  }

  private remember(text: string): void {
    const tail = this.options.tail;
    if (tail === undefined) {
      return;
    }
    this.recent.push(text);
    if (this.recent.length > tail) {
      this.recent.shift();
    }
  }
}
