// Workflow step definitions for the retry orchestrator

export interface StepOptions {
  /** Identity used for counters and checkpoints; defaults to the step kind (or name for custom steps) */
  id?: string;
  /** Skip this step on later runs of the same orchestrator once it has completed */
  checkpoint?: boolean;
}

export interface WorkflowContext {
  /** Project root used by create_session and as the base for create_file paths */
  root: string;
  sessionId?: string;
  signal?: AbortSignal;
}

/**
 * Directories and config produced by earlier steps of the same run
 */
export interface WorkflowState {
  context: WorkflowContext;
  sessionDir?: string;
  podDir?: string;
  workerDirs: string[];
  config?: unknown;
}

/**
 * What a checkpointed step added to the state, put back when a later run skips it
 */
export interface StepOutput {
  sessionDir?: string;
  podDir?: string;
  workerDirs: string[];
  config?: unknown;
}

export type WorkflowStep = StepOptions &
  (
    | { kind: 'load_config'; configPath: string }
    | { kind: 'create_session'; agentName?: string; projectRoot?: string }
    | { kind: 'create_pod'; podName: string }
    | { kind: 'create_worker'; workerId: string }
    | { kind: 'write_instructions'; instructions: string }
    | { kind: 'write_file'; path: string; data?: unknown }
    | { kind: 'create_file'; path: string }
    | { kind: 'verify_files'; expectedCount: number }
    | { kind: 'custom'; name: string; mutating?: boolean; run: (state: WorkflowState) => Promise<void> | void }
  );

export type StepKind = WorkflowStep['kind'];

export const MUTATING_KINDS: ReadonlySet<StepKind> = new Set<StepKind>([
  'create_session',
  'create_pod',
  'create_worker',
  'write_instructions',
  'write_file',
  'create_file',
]);

export function isMutating(step: WorkflowStep): boolean {
  return step.kind === 'custom' ? step.mutating === true : MUTATING_KINDS.has(step.kind);
}

export function stepKey(step: WorkflowStep): string {
  if (step.id) {
    return step.id;
  }
  return step.kind === 'custom' ? step.name : step.kind;
}

export interface WorkflowResult {
  status: 'completed';
  stepsExecuted: number;
  /** Failed attempts that a later retry recovered from */
  failures: number;
  /** Executions per step key, counted across every run of the orchestrator */
  perStepCounters: Record<string, number>;
  /** Checkpointed steps skipped because an earlier run completed them */
  skippedSteps: string[];
}
