/**
 * Command Executor for Host Operations
 *
 * Spawns host tools (qm, pvesh, pvesm, ip, ssh, ...) with an explicit
 * argument vector and collects their output. No shell is involved, so
 * arguments are never re-parsed.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for host command failures
 */
export type HostCommandErrorCode =
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'INVALID_RESPONSE'
  | 'EXECUTION_FAILED'
  | 'TOOL_NOT_AVAILABLE';

/**
 * Error thrown when a host command fails
 */
export class HostCommandError extends Error {
  constructor(
    message: string,
    public readonly code: HostCommandErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly command: string,
    public readonly args: readonly string[] = []
  ) {
    super(message);
    this.name = 'HostCommandError';
  }
}

/**
 * Raw result of a finished command
 */
export interface CommandResult {
  /** Process exit code (null when killed by a signal) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Options for running a single command
 */
export interface RunOptions {
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
}

/**
 * Options for constructing a CommandExecutor
 */
export interface CommandExecutorOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Anything that can run a host command.
 *
 * Network helpers and the SSH client depend on this rather than on
 * CommandExecutor so tests can hand them a scripted runner.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Runs host commands and classifies their failures.
 */
export class CommandExecutor implements CommandRunner {
  private readonly verbose: boolean;

  constructor(options?: CommandExecutorOptions) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run a command and return its exit code and output, whatever the exit code.
   *
   * @throws HostCommandError if the command cannot be spawned or times out
   */
  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const { timeout = 120000 } = options;

    if (this.verbose) {
      process.stderr.write(formatCommand(command, args, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
        reject(
          new HostCommandError(
            `${command} timed out after ${timeout}ms`,
            'EXECUTION_FAILED',
            null,
            stderr,
            command,
            args
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        if (killed) return;
        const code: HostCommandErrorCode = error.code === 'ENOENT' ? 'TOOL_NOT_AVAILABLE' : 'EXECUTION_FAILED';
        reject(
          new HostCommandError(
            `Failed to spawn ${command}: ${error.message}`,
            code,
            null,
            stderr,
            command,
            args
          )
        );
      });

      child.on('close', (exitCode: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;
        resolve({ exitCode, stdout, stderr });
      });
    });
  }

  /**
   * Run a command that must succeed and return its trimmed stdout.
   *
   * @throws HostCommandError if the command exits non-zero
   */
  async execute(command: string, args: readonly string[], options: RunOptions = {}): Promise<string> {
    const result = await this.run(command, args, options);

    if (result.exitCode !== 0) {
      throw new HostCommandError(
        formatErrorMessage(command, result.stderr || result.stdout, result.exitCode),
        classifyError(result.stderr || result.stdout),
        result.exitCode,
        result.stderr,
        command,
        args
      );
    }

    return result.stdout.trim();
  }

  /**
   * Run a command that prints JSON and parse it.
   *
   * @throws HostCommandError if the command fails or prints invalid JSON
   */
  async executeJson<T>(command: string, args: readonly string[], options: RunOptions = {}): Promise<T> {
    const output = await this.execute(command, args, options);
    try {
      return JSON.parse(output) as T;
    } catch {
      throw new HostCommandError(
        `Invalid JSON response from ${command}: ${output.slice(0, 200)}`,
        'INVALID_RESPONSE',
        0,
        '',
        command,
        args
      );
    }
  }
}

/**
 * Classify a failure based on the command's error output.
 */
export function classifyError(stderr: string): HostCommandErrorCode {
  const lowerStderr = stderr.toLowerCase();

  if (
    lowerStderr.includes('permission denied') ||
    lowerStderr.includes('access denied') ||
    lowerStderr.includes('not have permission') ||
    lowerStderr.includes('unauthorized')
  ) {
    return 'ACCESS_DENIED';
  }

  // qm: "Configuration file 'nodes/pve/qemu-server/101.conf' does not exist"
  if (
    lowerStderr.includes('does not exist') ||
    lowerStderr.includes('not found') ||
    lowerStderr.includes('no such vm')
  ) {
    return 'NOT_FOUND';
  }

  return 'EXECUTION_FAILED';
}

/**
 * Strip ANSI escape codes and carriage returns from a string.
 */
export function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Format a user-friendly error message from a command's error output.
 */
export function formatErrorMessage(command: string, stderr: string, exitCode: number | null): string {
  const lines = stripAnsiCodes(stderr)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    return `${command} exited with code ${exitCode}`;
  }

  return lines.slice(0, 3).join(' | ');
}
