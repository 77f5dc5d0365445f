/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, LabError } from '../core/errors.js';
import { describeAction, formatPlanSummary, type ProvisionPlan } from '../core/planner.js';
import type { LifecycleState, ResourceState, StepResult } from '../core/types.js';
import type { LogEntry } from '../lib/logger.js';
import type { PowerState } from '../proxmox/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  vmid?: number;
  address?: string;
  transitions?: LifecycleState[];
  steps?: StepOutput[];
  plan?: PlanOutput;
  vm?: VMInfo;
  validation?: ValidationOutput;
  error?: ErrorOutput;
  summary?: Record<string, number>;
  log?: LogEntry[];
  data?: Record<string, unknown>;
}

/**
 * Reconciler step as reported in JSON
 */
export interface StepOutput {
  step: string;
  applied: string[];
  skipped: string[];
  advisories: string[];
}

/**
 * VM information for status output
 */
export interface VMInfo {
  vmid: number;
  exists: boolean;
  name: string | null;
  power: PowerState | null;
  complete: boolean;
  facets: Record<string, boolean>;
  diskSizeGB: number | null;
  user: string | null;
  tags: string[];
  macAddress: string | null;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Validation result for validate command
 */
export interface ValidationOutput {
  valid: boolean;
  os?: string;
  images?: string[];
  errors?: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Plan output for plan command
 */
export interface PlanOutput {
  vmid: number;
  initialState: LifecycleState;
  decision: string;
  changes: number;
  steps: StepOutput[];
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

const FACET_LABELS: Record<keyof ResourceState['facets'], string> = {
  firmwareStore: 'EFI disk',
  primaryDisk: 'Primary disk',
  initDrive: 'Cloud-init drive',
  bootOrder: 'Boot order',
  guestAgent: 'Guest agent',
};

/**
 * Convert a reconciler step result for display.
 */
export function toStepOutput(result: StepResult): StepOutput {
  return {
    step: result.step,
    applied: result.applied.map(describeAction),
    skipped: result.skipped.map(describeAction),
    advisories: result.advisories.map((advisory) => advisory.message),
  };
}

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: LabError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
    };
    if (error?.suggestion) {
      this.result.error.suggestion = error.suggestion;
    }
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Provision Output
  // ===========================================================================

  /**
   * Record the lifecycle of a provisioning run.
   */
  provisionResult(
    vmid: number | null,
    transitions: LifecycleState[],
    steps: StepResult[],
    address?: string
  ): void {
    const stepOutputs = steps.map(toStepOutput);
    const applied = stepOutputs.reduce((sum, step) => sum + step.applied.length, 0);

    if (this.mode === 'human') {
      this.newline();
      this.info(`Lifecycle: ${transitions.join(' → ')}`);
      if (address && vmid !== null) {
        this.success(`VM ${vmid} is ready at ${address}`);
      }
    }

    if (vmid !== null) this.result.vmid = vmid;
    if (address) this.result.address = address;
    this.result.transitions = transitions;
    this.result.steps = stepOutputs;
    this.result.summary = { ...this.result.summary, applied };
  }

  // ===========================================================================
  // Status Output
  // ===========================================================================

  /**
   * Print the facets of one VM.
   */
  statusReport(vmid: number, state: ResourceState | null, power: PowerState | null): void {
    const info: VMInfo = {
      vmid,
      exists: state !== null,
      name: state?.name ?? null,
      power,
      complete: state?.isComplete ?? false,
      facets: state ? { ...state.facets } : {},
      diskSizeGB: state?.diskSizeGB ?? null,
      user: state?.ciUser ?? null,
      tags: state?.tags ?? [],
      macAddress: state?.macAddress ?? null,
    };

    if (this.mode === 'human') {
      if (!state) {
        this.info(`VM ${vmid} does not exist.`);
      } else {
        this.info(`VM ${vmid}: ${state.name ?? '(unnamed)'} (${power ?? 'unknown'})`);
        this.newline();
        this.indent();
        this.table(
          ['FACET', 'STATE'],
          Object.entries(FACET_LABELS).map(([key, label]) => [
            label,
            info.facets[key] ? 'present' : 'missing',
          ])
        );
        this.dedent();
        this.newline();
        if (state.diskSizeGB !== null) this.info(`Disk: ${state.diskSizeGB}G`);
        if (state.ciUser) this.info(`User: ${state.ciUser}`);
        if (state.tags.length > 0) this.info(`Tags: ${state.tags.join(', ')}`);
        this.info(state.isComplete ? 'Configuration complete.' : 'Configuration incomplete; run provision to resume.');
      }
    }

    this.result.vm = info;
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  validationSuccess(os: string | undefined, images: string[]): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`OS: ${os ?? '(chosen at run time)'}`);
      this.info(`Images: ${images.join(', ')}`);
      this.dedent();
    }

    const validation: ValidationOutput = { valid: true, images };
    if (os) validation.os = os;
    this.result.validation = validation;
  }

  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.validation = { valid: false, errors };
    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // Plan Output
  // ===========================================================================

  planSummary(vmid: number, plan: ProvisionPlan): void {
    const steps = plan.steps.map((step) => ({
      step: step.step,
      applied: step.apply.map(describeAction),
      skipped: step.skip.map(describeAction),
      advisories: step.advisories.map((advisory) => advisory.message),
    }));

    if (this.mode === 'human') {
      this.info(`VM ${vmid}: ${plan.initialState}, ${plan.decision}`);
      this.newline();
      if (plan.decision === 'recreate') {
        console.log(`  - destroy VM ${vmid}`);
      }
      for (const step of steps) {
        for (const action of step.applied) console.log(`  + ${action}`);
        for (const action of step.skipped) console.log(`  = ${action}`);
        for (const advisory of step.advisories) console.log(`  ! ${advisory}`);
      }
      this.newline();
      this.info(`Plan: ${formatPlanSummary(plan)}.`);
    }

    this.result.plan = {
      vmid,
      initialState: plan.initialState,
      decision: plan.decision,
      changes: plan.summary.apply + plan.summary.destroy,
      steps,
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Set additional data for JSON output.
   */
  setData(key: string, value: unknown): void {
    this.result.data = { ...this.result.data, [key]: value };
  }

  /**
   * Attach the core logger's transcript.
   */
  setLog(entries: LogEntry[]): void {
    this.result.log = entries;
  }

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(command: string, options: { json?: boolean }): OutputFormatter {
  return new OutputFormatter(command, options);
}
