/**
 * Host NUMA detection.
 */

import { HostCommandError, type CommandRunner } from '../lib/executor.js';

/**
 * Read the node count from `numactl --hardware`.
 */
export function parseNumaNodes(output: string): number {
  const match = output.match(/^available:\s*(\d+)\s+nodes?/m);
  return match?.[1] ? Number(match[1]) : 1;
}

/**
 * Whether the host has more than one NUMA node.
 *
 * A host without numactl is treated as a single node.
 */
export async function detectNuma(runner: CommandRunner): Promise<boolean> {
  try {
    const result = await runner.run('numactl', ['--hardware'], { timeout: 10000 });
    if (result.exitCode !== 0) {
      return false;
    }
    return parseNumaNodes(result.stdout) > 1;
  } catch (error) {
    if (error instanceof HostCommandError && error.code === 'TOOL_NOT_AVAILABLE') {
      return false;
    }
    throw error;
  }
}
