/**
 * SSH Client
 *
 * Runs a command in a guest over ssh. The command is an argument vector;
 * each element is quoted before it reaches the remote shell.
 */

import { HostCommandError, type CommandResult, type CommandRunner } from '../lib/executor.js';
import { shellQuote } from '../lib/verbose.js';

/**
 * Where and as whom to connect
 */
export interface ShellTarget {
  host: string;
  user: string;
  /** Private key file */
  identityFile: string;
  port?: number;
}

/**
 * Outcome of one remote command
 */
export type ExecResult =
  | { reachable: true; exitCode: number; stdout: string; stderr: string }
  | { reachable: false; reason: string };

export interface ExecOptions {
  /** Overall timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
}

/**
 * Remote command execution in a guest
 */
export interface RemoteShell {
  exec(target: ShellTarget, argv: readonly string[], options?: ExecOptions): Promise<ExecResult>;
}

/** ssh exits 255 when the connection itself failed */
const SSH_CONNECTION_FAILURE = 255;

/**
 * Build the ssh argument vector for a remote command.
 */
export function buildSshArgs(target: ShellTarget, argv: readonly string[]): string[] {
  const args = [
    '-o',
    'StrictHostKeyChecking=no',
    '-o',
    'UserKnownHostsFile=/dev/null',
    '-o',
    'LogLevel=ERROR',
    '-o',
    'ConnectTimeout=5',
    '-o',
    'BatchMode=yes',
    '-i',
    target.identityFile,
  ];
  if (target.port !== undefined) {
    args.push('-p', String(target.port));
  }
  args.push(`${target.user}@${target.host}`, '--', argv.map(shellQuote).join(' '));
  return args;
}

/**
 * RemoteShell backed by the OpenSSH client.
 */
export class SshClient implements RemoteShell {
  constructor(private readonly runner: CommandRunner) {}

  async exec(target: ShellTarget, argv: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { timeoutMs = 60000 } = options;
    let result: CommandResult;
    try {
      result = await this.runner.run('ssh', buildSshArgs(target, argv), { timeout: timeoutMs });
    } catch (error) {
      // A hung session is as good as unreachable; a missing ssh binary is not
      if (error instanceof HostCommandError && error.code === 'EXECUTION_FAILED') {
        return { reachable: false, reason: error.message };
      }
      throw error;
    }

    if (result.exitCode === null || result.exitCode === SSH_CONNECTION_FAILURE) {
      const reason = result.stderr.trim().split('\n')[0] || 'connection failed';
      return { reachable: false, reason };
    }

    return {
      reachable: true,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
