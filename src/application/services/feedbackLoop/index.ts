// Feedback Loop - supervisor/worker retry state machine for one pod
// idle -> running -> COMPLETE | FAILED
// One attempt in flight at a time; result.json for attempt k is written before feedback.json for attempt k

import * as path from 'path';
import { LoggerPort } from '../../../domain/ports/logger';
import { WorkerPort } from '../../../domain/ports/worker';
import {
  EvaluationVerdict,
  InstructionsDocument,
  LoopHistoryEntry,
  LoopOutcome,
  LoopStatus,
  MAX_ATTEMPTS_EXCEEDED,
} from '../../../domain/types/types';
import { ConfigError, LlmError, LlmErrorKind, WorkflowAbortedError, isLlmTimeout } from '../../../domain/types/errors';
import { FeedbackExchange, isEmptyResult } from '../feedbackExchange';
import { SupervisorEvaluation, resolveOutputPath } from '../supervisorEvaluation';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_WORKER_ID = 'worker';

export interface FeedbackLoopOptions {
  podDir: string;
  podId: string;
  maxAttempts?: number;
  /** Per-attempt ceiling on the worker call; a miss ends the loop as a timeout */
  timeoutMs?: number;
  workerId?: string;
  sessionId?: string;
  signal?: AbortSignal;
}

export interface FeedbackLoopDeps {
  exchange: FeedbackExchange;
  worker: WorkerPort;
  supervisor: SupervisorEvaluation;
  logger: LoggerPort;
}

export function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined, label: string): Promise<T> {
  if (timeoutMs === undefined) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new LlmError(LlmErrorKind.TIMEOUT, `${label} exceeded ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export class FeedbackLoop {
  readonly podDir: string;
  readonly podId: string;
  readonly maxAttempts: number;

  private currentAttempt = 0;
  private iterationCount = 0;
  private status: LoopStatus = 'idle';
  private history: LoopHistoryEntry[] = [];

  constructor(private deps: FeedbackLoopDeps, private options: FeedbackLoopOptions) {
    this.podDir = options.podDir;
    this.podId = options.podId;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new ConfigError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  async run(): Promise<LoopOutcome> {
    const startTime = Date.now();

    // Missing or malformed instructions are setup errors: fatal, never retried
    const instructions = await this.deps.exchange.readInstructions(this.podDir);
    this.transition('running');

    try {
      const outcome = await this.runAttempts(instructions);
      this.deps.logger.logPerformance('[FeedbackLoop] Run', Date.now() - startTime, {
        pod_id: this.podId,
        status: outcome.status,
        attempts: outcome.attempts,
      });
      return outcome;
    } catch (error) {
      this.transition('FAILED');
      if (isLlmTimeout(error)) {
        this.deps.logger.log('FeedbackLoop', `Pod ${this.podId} timed out on attempt ${this.currentAttempt}`);
        return { status: 'FAIL', reason: `timeout: ${error.detail}`, attempts: this.currentAttempt };
      }
      this.deps.logger.logError('FeedbackLoop', `Pod ${this.podId} failed on attempt ${this.currentAttempt}`, error);
      throw error;
    }
  }

  private async runAttempts(instructions: InstructionsDocument): Promise<LoopOutcome> {
    while (this.currentAttempt < this.maxAttempts) {
      if (this.options.signal?.aborted) {
        throw new WorkflowAbortedError(`${this.podId} attempt ${this.currentAttempt + 1}`);
      }

      this.currentAttempt += 1;
      this.iterationCount += 1;
      this.deps.logger.log('FeedbackLoop', `Pod ${this.podId}: attempt ${this.currentAttempt}/${this.maxAttempts}`);

      const verdict = await this.runIteration(instructions);

      if (verdict.status === 'PASS') {
        this.transition('COMPLETE');
        const outputPath = resolveOutputPath(this.podDir, instructions);
        const resultDoc = await this.deps.exchange.readResult(path.dirname(outputPath), path.basename(outputPath));
        return { status: 'PASS', attempts: this.currentAttempt, result: resultDoc.result };
      }

      this.history.push({ attempt: this.currentAttempt, status: 'FAIL', gaps: [...verdict.gaps] });
    }

    this.transition('FAILED');
    this.deps.logger.log('FeedbackLoop', `Pod ${this.podId}: max attempts exceeded`, { attempts: this.currentAttempt });
    return { status: 'FAIL', reason: MAX_ATTEMPTS_EXCEEDED, attempts: this.currentAttempt };
  }

  private async runIteration(instructions: InstructionsDocument): Promise<EvaluationVerdict> {
    const label = `worker attempt ${this.currentAttempt} for pod ${this.podId}`;
    let output: unknown;

    if (this.currentAttempt === 1) {
      output = await withTimeout(this.deps.worker.execute(instructions), this.options.timeoutMs, label);
    } else {
      const feedback = await this.deps.exchange.readFeedback(this.podDir);
      if (feedback?.status !== 'FAIL') {
        // Nothing to retry from; re-evaluate what is on disk
        this.deps.logger.logVerbose('FeedbackLoop', 'No FAIL feedback before retry, skipping worker', {
          pod_id: this.podId,
          attempt: this.currentAttempt,
        });
        return this.deps.supervisor.evaluatePod(this.podDir, this.podId, this.currentAttempt);
      }
      output = await withTimeout(this.deps.worker.executeWithFeedback(instructions, feedback), this.options.timeoutMs, label);
    }

    const outputPath = resolveOutputPath(this.podDir, instructions);

    if (isEmptyResult(output)) {
      this.deps.logger.logVerbose('FeedbackLoop', 'Worker returned no result', { pod_id: this.podId, attempt: this.currentAttempt });
      // result.json must never pair an earlier attempt's output with this attempt's feedback
      await this.deps.exchange.clearResult(path.dirname(outputPath), path.basename(outputPath));
      return this.deps.supervisor.evaluate(instructions.instructions, null, this.podDir, this.podId, this.currentAttempt);
    }

    await this.deps.exchange.writeResult(
      output,
      path.dirname(outputPath),
      {
        workerId: this.options.workerId ?? DEFAULT_WORKER_ID,
        podId: this.podId,
        sessionId: this.options.sessionId ?? instructions.session_id ?? '',
      },
      path.basename(outputPath)
    );
    return this.deps.supervisor.evaluatePod(this.podDir, this.podId, this.currentAttempt);
  }

  private transition(next: LoopStatus): void {
    this.deps.logger.logStateTransition(this.status, next, { pod_id: this.podId, attempt: this.currentAttempt });
    this.status = next;
  }

  getHistory(): LoopHistoryEntry[] {
    return this.history.map(entry => ({ ...entry, gaps: [...entry.gaps] }));
  }

  getIterationCount(): number {
    return this.iterationCount;
  }

  getCurrentAttempt(): number {
    return this.currentAttempt;
  }

  getStatus(): LoopStatus {
    return this.status;
  }
}
