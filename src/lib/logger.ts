/**
 * Logger for labforge
 *
 * Step-level progress reporting used by the core modules. Supports
 * human-readable and JSON output modes; every message is also kept as
 * an entry so JSON output can embed the run transcript.
 */

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * Log level for messages
 */
export type LogLevel = 'step' | 'info' | 'success' | 'skip' | 'warning' | 'error';

/**
 * A recorded log message
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
}

const SYMBOLS: Record<LogLevel, string> = {
  step: '▸',
  info: '',
  success: '✓',
  skip: '↷',
  warning: '⚠',
  error: '✗',
};

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode prints each message as it happens.
 * JSON mode prints nothing; callers read the entries back with getEntries().
 */
export class Logger {
  private mode: OutputMode;
  private entries: LogEntry[] = [];
  private indentLevel: number = 0;

  constructor(mode: OutputMode = 'human') {
    this.mode = mode;
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  /**
   * Log the start of a named step.
   */
  step(message: string): void {
    this.write('step', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  success(message: string): void {
    this.write('success', message);
  }

  /**
   * Log an action that was not needed because its effect is already present.
   */
  skip(message: string): void {
    this.write('skip', message);
  }

  warning(message: string): void {
    this.write('warning', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /**
   * Get all recorded entries.
   */
  getEntries(): LogEntry[] {
    return this.entries;
  }

  /**
   * Get recorded messages of a single level.
   */
  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  private write(level: LogLevel, message: string): void {
    this.entries.push({ level, message });

    if (this.mode !== 'human') {
      return;
    }

    const indent = '  '.repeat(this.indentLevel);
    const symbol = SYMBOLS[level];
    const line = symbol ? `${indent}${symbol} ${message}` : `${indent}${message}`;

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warning') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { json?: boolean }): Logger {
    return new Logger(options.json ? 'json' : 'human');
  }
}
