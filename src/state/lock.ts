/**
 * Process Lock
 *
 * A PID file that keeps two runs from overlapping. A lock whose owner is
 * no longer alive is stale and is taken over.
 */

import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { unlinkSync } from 'node:fs';
import { dirname } from 'node:path';

import { LockError } from '../core/errors.js';

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Whether a process with this PID exists.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: it exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

export interface ProcessLockOptions {
  pid?: number;
  isAlive?: (pid: number) => boolean;
  /** Remove the lock file when the process exits (default: true) */
  releaseOnExit?: boolean;
}

export class ProcessLock {
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly releaseOnExit: boolean;
  private held = false;
  private readonly onExit = (): void => {
    this.releaseSync();
  };

  constructor(
    private readonly lockPath: string,
    options: ProcessLockOptions = {}
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.releaseOnExit = options.releaseOnExit ?? true;
  }

  /**
   * Take the lock.
   *
   * @throws LockError when a live process holds it
   */
  async acquire(): Promise<void> {
    await mkdir(dirname(this.lockPath), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await writeFile(this.lockPath, `${this.pid}\n`, { flag: 'wx' });
        this.held = true;
        if (this.releaseOnExit) {
          process.once('exit', this.onExit);
        }
        return;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
      }

      const owner = await this.readOwner();
      if (owner !== null && owner !== this.pid && this.isAlive(owner)) {
        throw new LockError(this.lockPath, owner);
      }
      await this.removeFile();
    }

    throw new LockError(this.lockPath, (await this.readOwner()) ?? 0);
  }

  /**
   * Release the lock if this instance holds it.
   */
  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    process.removeListener('exit', this.onExit);
    await this.removeFile();
  }

  isHeld(): boolean {
    return this.held;
  }

  private releaseSync(): void {
    if (!this.held) {
      return;
    }
    this.held = false;
    try {
      unlinkSync(this.lockPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  private async readOwner(): Promise<number | null> {
    try {
      const pid = Number.parseInt((await readFile(this.lockPath, 'utf-8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private async removeFile(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}
