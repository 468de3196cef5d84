// Retry Orchestrator - generic step-sequence executor
// Per-step retries with linear backoff, one circuit breaker per instance,
// checkpoints for resumed runs, rollback of created paths when a mutating step fails for good

import * as path from 'path';
import { CircuitBreaker } from '../../../domain/policies/retry/circuitBreaker';
import { FileStorePort } from '../../../domain/ports/fileStore';
import { LoggerPort } from '../../../domain/ports/logger';
import { HARNESS_DIR } from '../../../domain/types/types';
import {
  CircuitBreakerOpenError,
  ConfigError,
  HarnessError,
  HarnessErrorCode,
  ValidationError,
  WorkflowAbortedError,
  errorMessage,
} from '../../../domain/types/errors';
import { DirectoryNamer } from '../../../infrastructure/adapters/storage/directoryNamer';
import { ConfigLoader } from '../../../infrastructure/config/configLoader';
import { FeedbackExchange } from '../feedbackExchange';
import {
  StepOutput,
  WorkflowContext,
  WorkflowResult,
  WorkflowState,
  WorkflowStep,
  isMutating,
  stepKey,
} from './types';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;

// Setup and validation problems do not go away on retry
const NON_RETRYABLE_CODES: ReadonlySet<HarnessErrorCode> = new Set<HarnessErrorCode>([
  'NOT_FOUND',
  'DECODE_ERROR',
  'CONFIG_ERROR',
  'VALIDATION_ERROR',
]);

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryable(error: unknown): boolean {
  return !(error instanceof HarnessError && NON_RETRYABLE_CODES.has(error.code));
}

function restoreOutput(state: WorkflowState, output: StepOutput): void {
  if (output.sessionDir !== undefined) {
    state.sessionDir = output.sessionDir;
  }
  if (output.podDir !== undefined) {
    state.podDir = output.podDir;
  }
  if (output.config !== undefined) {
    state.config = output.config;
  }
  state.workerDirs.push(...output.workerDirs);
}

export interface RetryOrchestratorOptions {
  maxRetries?: number;
  backoffBaseMs?: number;
  /** Failures across all steps before the breaker opens; defaults to maxRetries */
  failureThreshold?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOrchestratorDeps {
  namer: DirectoryNamer;
  exchange: FeedbackExchange;
  configLoader: ConfigLoader;
  store: FileStorePort;
  logger: LoggerPort;
}

export class RetryOrchestrator {
  readonly maxRetries: number;
  readonly backoffBaseMs: number;

  private circuitBreaker: CircuitBreaker;
  private sleep: (ms: number) => Promise<void>;
  private perStepCounters: Record<string, number> = {};
  private checkpoints = new Map<string, StepOutput>();
  private createdFiles: string[] = [];
  private createdDirs: string[] = [];
  // Step key that registered each created path
  private pathOwners = new Map<string, string>();

  constructor(private deps: RetryOrchestratorDeps, options: RetryOrchestratorOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) {
      throw new ConfigError(`maxRetries must be a positive integer, got ${this.maxRetries}`);
    }
    if (this.backoffBaseMs < 0) {
      throw new ConfigError(`backoffBaseMs must not be negative, got ${this.backoffBaseMs}`);
    }
    this.circuitBreaker = new CircuitBreaker(options.failureThreshold ?? this.maxRetries);
    this.sleep = options.sleep ?? sleep;
  }

  async executeWithRetry(steps: WorkflowStep[], context: WorkflowContext): Promise<WorkflowResult> {
    const startTime = Date.now();
    const state: WorkflowState = { context, workerDirs: [] };
    const skippedSteps: string[] = [];
    let stepsExecuted = 0;
    let failures = 0;

    for (const step of steps) {
      const key = stepKey(step);
      this.perStepCounters[key] ??= 0;

      const saved = step.checkpoint ? this.checkpoints.get(key) : undefined;
      if (saved) {
        this.deps.logger.logVerbose('RetryOrchestrator', 'Skipping checkpointed step', { step: key });
        restoreOutput(state, saved);
        skippedSteps.push(key);
        continue;
      }

      const before = {
        sessionDir: state.sessionDir,
        podDir: state.podDir,
        workerCount: state.workerDirs.length,
        config: state.config,
      };
      failures += await this.runStep(step, key, state);
      stepsExecuted += 1;

      if (step.checkpoint) {
        this.checkpoints.set(key, {
          sessionDir: state.sessionDir !== before.sessionDir ? state.sessionDir : undefined,
          podDir: state.podDir !== before.podDir ? state.podDir : undefined,
          workerDirs: state.workerDirs.slice(before.workerCount),
          config: state.config !== before.config ? state.config : undefined,
        });
      }
    }

    this.deps.logger.logPerformance('[RetryOrchestrator] ExecuteWithRetry', Date.now() - startTime, {
      steps_executed: stepsExecuted,
      failures,
    });

    return {
      status: 'completed',
      stepsExecuted,
      failures,
      perStepCounters: { ...this.perStepCounters },
      skippedSteps,
    };
  }

  /**
   * Runs one step until it succeeds; returns how many attempts failed first
   */
  private async runStep(step: WorkflowStep, key: string, state: WorkflowState): Promise<number> {
    const { signal } = state.context;

    for (let attempt = 1; ; attempt++) {
      this.throwIfAborted(signal, key);

      if (this.circuitBreaker.isOpen()) {
        throw await this.abandonStep(step, new CircuitBreakerOpenError(key, this.circuitBreaker.getFailureCount()));
      }

      this.perStepCounters[key] += 1;
      this.deps.logger.logStateTransition('PENDING', 'ATTEMPTING', { step: key, attempt });

      try {
        await this.performStep(step, key, state);
        this.deps.logger.logStateTransition('ATTEMPTING', 'SUCCESS', { step: key, attempt });
        return attempt - 1;
      } catch (error) {
        this.circuitBreaker.recordFailure();
        this.deps.logger.logStateTransition('ATTEMPTING', 'FAILURE', {
          step: key,
          attempt,
          failure_count: this.circuitBreaker.getFailureCount(),
          error: errorMessage(error),
        });

        if (attempt >= this.maxRetries || !isRetryable(error)) {
          if (isMutating(step)) {
            await this.rollback();
            if (this.circuitBreaker.isOpen()) {
              throw new CircuitBreakerOpenError(key, this.circuitBreaker.getFailureCount(), error);
            }
          }
          throw error;
        }

        if (this.circuitBreaker.isOpen()) {
          throw await this.abandonStep(step, new CircuitBreakerOpenError(key, this.circuitBreaker.getFailureCount(), error));
        }

        this.throwIfAborted(signal, key);
        const delay = this.backoffBaseMs * attempt;
        this.deps.logger.logVerbose('RetryOrchestrator', 'Backing off before retry', { step: key, attempt, delay_ms: delay });
        await this.sleep(delay);
      }
    }
  }

  private async abandonStep(step: WorkflowStep, error: CircuitBreakerOpenError): Promise<CircuitBreakerOpenError> {
    this.deps.logger.logError('RetryOrchestrator', 'Circuit breaker open', error);
    if (isMutating(step)) {
      await this.rollback();
    }
    return error;
  }

  private throwIfAborted(signal: AbortSignal | undefined, key: string): void {
    if (signal?.aborted) {
      throw new WorkflowAbortedError(key);
    }
  }

  private async performStep(step: WorkflowStep, key: string, state: WorkflowState): Promise<void> {
    const { context } = state;

    switch (step.kind) {
      case 'load_config':
        state.config = await this.deps.configLoader.load(step.configPath);
        return;

      case 'create_session': {
        const root = step.projectRoot ?? context.root;
        const harnessDir = path.join(root, HARNESS_DIR);
        const harnessExisted = await this.deps.store.exists(harnessDir);
        const sessionDir = await this.deps.namer.createSessionDir(root, step.agentName ?? 'agent');
        if (!harnessExisted) {
          this.registerDir(harnessDir, key);
        }
        this.registerDir(sessionDir, key);
        state.sessionDir = sessionDir;
        return;
      }

      case 'create_pod': {
        if (!state.sessionDir) {
          throw new ConfigError('create_pod requires an earlier create_session step');
        }
        const podDir = await this.deps.namer.createPodDir(state.sessionDir, step.podName);
        this.registerDir(podDir, key);
        state.podDir = podDir;
        return;
      }

      case 'create_worker': {
        if (!state.podDir) {
          throw new ConfigError('create_worker requires an earlier create_pod step');
        }
        const workerDir = await this.deps.namer.createWorkerDir(state.podDir, step.workerId);
        this.registerDir(workerDir, key);
        state.workerDirs.push(workerDir);
        return;
      }

      case 'write_instructions': {
        if (!state.podDir) {
          throw new ConfigError('write_instructions requires an earlier create_pod step');
        }
        const sessionId = context.sessionId ?? (state.sessionDir ? path.basename(state.sessionDir) : undefined);
        if (!sessionId) {
          throw new ConfigError('write_instructions requires a session id or an earlier create_session step');
        }
        const filePath = await this.deps.exchange.writeInstructions(step.instructions, state.podDir, sessionId);
        this.registerFile(filePath, key);
        return;
      }

      case 'write_file': {
        const filePath = path.resolve(context.root, step.path);
        await this.deps.store.writeAtomic(filePath, step.data ?? {});
        this.registerFile(filePath, key);
        return;
      }

      case 'create_file': {
        const filePath = path.resolve(context.root, step.path);
        await this.deps.store.writeAtomic(filePath, { created: true });
        this.registerFile(filePath, key);
        return;
      }

      case 'verify_files': {
        let found = 0;
        for (const filePath of this.createdFiles) {
          if (await this.deps.store.exists(filePath)) {
            found += 1;
          }
        }
        if (found !== step.expectedCount) {
          throw new ValidationError(`Expected ${step.expectedCount} created files, found ${found}`);
        }
        return;
      }

      case 'custom':
        await step.run(state);
        return;
    }
  }

  private registerFile(filePath: string, key: string): void {
    if (!this.createdFiles.includes(filePath)) {
      this.createdFiles.push(filePath);
    }
    this.pathOwners.set(filePath, key);
  }

  private registerDir(dirPath: string, key: string): void {
    if (!this.createdDirs.includes(dirPath)) {
      this.createdDirs.push(dirPath);
    }
    this.pathOwners.set(dirPath, key);
  }

  /**
   * Delete every registered file, then every registered directory, newest first.
   * Missing paths are ignored; other failures are logged and the rest still run.
   * Steps whose paths were rolled back lose their checkpoint and run again next time.
   */
  async rollback(): Promise<void> {
    const startTime = Date.now();

    for (const filePath of this.createdFiles) {
      try {
        await this.deps.store.remove(filePath);
      } catch (error) {
        this.deps.logger.logError('RetryOrchestrator', `Rollback could not remove file ${filePath}`, error);
      }
    }

    for (const dirPath of [...this.createdDirs].reverse()) {
      try {
        await this.deps.store.remove(dirPath);
      } catch (error) {
        this.deps.logger.logError('RetryOrchestrator', `Rollback could not remove directory ${dirPath}`, error);
      }
    }

    this.deps.logger.logPerformance('[RetryOrchestrator] Rollback', Date.now() - startTime, {
      files: this.createdFiles.length,
      dirs: this.createdDirs.length,
    });

    for (const created of [...this.createdFiles, ...this.createdDirs]) {
      const owner = this.pathOwners.get(created);
      if (owner !== undefined && this.checkpoints.delete(owner)) {
        this.deps.logger.logVerbose('RetryOrchestrator', 'Checkpoint dropped by rollback', { step: owner });
      }
    }
    this.createdFiles = [];
    this.createdDirs = [];
    this.pathOwners.clear();
  }

  getCreatedPaths(): { files: string[]; dirs: string[] } {
    return { files: [...this.createdFiles], dirs: [...this.createdDirs] };
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  getCheckpoints(): string[] {
    return [...this.checkpoints.keys()];
  }
}
