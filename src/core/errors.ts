/**
 * Error Types for labforge
 *
 * Custom error classes with error codes for structured error handling.
 */

import { HostCommandError } from '../lib/executor.js';

/**
 * Error codes for all labforge errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_IDENTIFIER'
  | 'UNKNOWN_OS'
  | 'IMAGE_NOT_FOUND'
  | 'SSH_KEY_NOT_FOUND'
  | 'STORAGE_NOT_FOUND'
  | 'HOST_NOT_AVAILABLE'
  | 'HOST_CALL_FAILED'
  | 'NETWORK_TIMEOUT'
  | 'SHELL_TIMEOUT'
  | 'LOCK_HELD'
  | 'STATE_CORRUPTED'
  | 'OPERATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_IDENTIFIER: 1,
  UNKNOWN_OS: 1,
  IMAGE_NOT_FOUND: 1,
  SSH_KEY_NOT_FOUND: 1,
  STORAGE_NOT_FOUND: 1,
  HOST_NOT_AVAILABLE: 2,
  HOST_CALL_FAILED: 2,
  NETWORK_TIMEOUT: 3,
  SHELL_TIMEOUT: 3,
  LOCK_HELD: 4,
  STATE_CORRUPTED: 2,
  OPERATION_FAILED: 2,
};

/**
 * Base error class for all labforge errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class LabError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'LabError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, LabError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends LabError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED' | 'UNKNOWN_OS',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for an identifier that is malformed or outside the platform range.
 */
export class IdentifierError extends LabError {
  constructor(
    message: string,
    public readonly value: string,
    suggestion: string = 'VM identifiers are integers between 100 and 999999.'
  ) {
    super(message, 'INVALID_IDENTIFIER', suggestion);
    this.name = 'IdentifierError';
    Object.setPrototypeOf(this, IdentifierError.prototype);
  }
}

/**
 * Error for preflight check failures.
 */
export class PreflightError extends LabError {
  constructor(
    message: string,
    code: 'HOST_NOT_AVAILABLE' | 'IMAGE_NOT_FOUND' | 'SSH_KEY_NOT_FOUND' | 'STORAGE_NOT_FOUND',
    suggestion?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message, code, suggestion);
    this.name = 'PreflightError';
    Object.setPrototypeOf(this, PreflightError.prototype);
  }
}

/**
 * Error for hint-file issues.
 */
export class StateError extends LabError {
  constructor(
    message: string,
    public readonly statePath: string
  ) {
    super(message, 'STATE_CORRUPTED', `Remove ${statePath}; it only holds hints and is rebuilt on the next run.`);
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

/**
 * Error raised when another run holds the process lock.
 */
export class LockError extends LabError {
  constructor(
    public readonly lockPath: string,
    public readonly ownerPid: number
  ) {
    super(
      `Another labforge run (pid ${ownerPid}) holds ${lockPath}`,
      'LOCK_HELD',
      'Wait for the other run to finish. The lock is released automatically when it exits.'
    );
    this.name = 'LockError';
    Object.setPrototypeOf(this, LockError.prototype);
  }
}

/**
 * A host management call failed for a reason other than not-found.
 *
 * Fatal to the current step; the partially built VM is left in place.
 */
export class HostCallFailure extends LabError {
  constructor(
    public readonly step: string,
    message: string,
    public readonly stderr: string,
    public readonly hostExitCode: number | null = null
  ) {
    super(
      `${step} failed: ${message}`,
      'HOST_CALL_FAILED',
      'Fix the reported problem and re-run the same command; completed steps are skipped.'
    );
    this.name = 'HostCallFailure';
    Object.setPrototypeOf(this, HostCallFailure.prototype);
  }

  /**
   * Wrap whatever a step threw into a HostCallFailure.
   */
  static from(step: string, error: unknown): HostCallFailure {
    if (error instanceof HostCallFailure) {
      return error;
    }
    if (error instanceof HostCommandError) {
      return new HostCallFailure(step, error.message, error.stderr, error.exitCode);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new HostCallFailure(step, message, '');
  }
}

/**
 * A readiness wait ran out of time and the caller treats that as fatal.
 */
export class ReadinessTimeoutError extends LabError {
  constructor(
    code: 'NETWORK_TIMEOUT' | 'SHELL_TIMEOUT',
    message: string,
    public readonly elapsedMs: number
  ) {
    super(
      message,
      code,
      code === 'NETWORK_TIMEOUT'
        ? 'Verify the VM has network on its bridge and that qemu-guest-agent is installed.'
        : 'Verify the SSH key was injected by cloud-init and the guest firewall allows SSH.'
    );
    this.name = 'ReadinessTimeoutError';
    Object.setPrototypeOf(this, ReadinessTimeoutError.prototype);
  }
}

/**
 * Check if an error is a LabError.
 */
export function isLabError(error: unknown): error is LabError {
  return error instanceof LabError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isLabError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
