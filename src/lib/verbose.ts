/**
 * Verbose Output Helpers
 *
 * Formats host commands for --verbose CLI output.
 * Used by CommandExecutor to print each command to stderr
 * before it is spawned.
 */

/**
 * Indent for continuation lines.
 */
const CONTINUATION_INDENT = '    ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Arguments longer than this are wrapped onto their own line.
 */
const WRAP_WIDTH = 100;

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 * Returns false when stderr is piped, redirected, or non-interactive.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote a single argument for a POSIX shell.
 *
 * Plain arguments are returned as-is; anything containing whitespace or
 * shell metacharacters is single-quoted. Used for the verbose echo and
 * for the remote command line handed to ssh.
 */
export function shellQuote(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Format a host command for verbose output.
 *
 * Produces a fenced block suitable for writing to stderr:
 * - Blank line before and after the command block
 * - First line prefixed with `[<command>] `
 * - When the rendered line exceeds the wrap width, each `--flag value`
 *   pair moves to its own continuation line
 * - Optionally wrapped in ANSI gray (SGR 90) when `ansi` is true
 *
 * @param command - Executable name
 * @param args - Argument vector
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: string, args: readonly string[], ansi: boolean): string {
  const quoted = args.map(shellQuote);
  const prefix = `[${command}] `;
  const single = `${prefix}${[command, ...quoted].join(' ')}`;

  let body: string;
  if (single.length <= WRAP_WIDTH) {
    body = `${single}\n`;
  } else {
    const lines: string[] = [];
    let current = `${prefix}${command}`;
    for (const arg of quoted) {
      if (arg.startsWith('--')) {
        lines.push(current);
        current = `${CONTINUATION_INDENT}${arg}`;
      } else {
        current += ` ${arg}`;
      }
    }
    lines.push(current);
    body = lines.map((line) => `${line}\n`).join('');
  }

  // Fence with blank lines
  const plain = `\n${body}\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
