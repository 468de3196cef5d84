// Harness wiring
// Builds the services for one process; each pod still gets its own loop instance

import * as path from 'path';
import { HarnessConfig } from './config/harnessConfig';
import { LlmConfig } from './config/llmConfig';
import { ClockPort } from './domain/ports/clock';
import { FileStorePort } from './domain/ports/fileStore';
import { LlmClientPort } from './domain/ports/llmProvider';
import { LoggerPort } from './domain/ports/logger';
import { RequirementComparator } from './domain/evaluation/requirementComparator';
import { FeedbackExchange } from './application/services/feedbackExchange';
import { FeedbackLoop } from './application/services/feedbackLoop';
import { SupervisorEvaluation } from './application/services/supervisorEvaluation';
import { WorkerExecution } from './application/services/workerExecution';
import { RetryOrchestrator, RetryOrchestratorOptions } from './application/services/workflow/retryOrchestrator';
import { systemClock } from './infrastructure/adapters/clock/systemClock';
import { defaultLogger } from './infrastructure/adapters/logging/loggerAdapter';
import { AtomicFileStore } from './infrastructure/adapters/storage/atomicFileStore';
import { DirectoryNamer } from './infrastructure/adapters/storage/directoryNamer';
import { ConfigLoader } from './infrastructure/config/configLoader';

export interface HarnessOptions {
  baseDir?: string;
  store?: FileStorePort;
  clock?: ClockPort;
  logger?: LoggerPort;
  idGenerator?: () => string;
  env?: NodeJS.ProcessEnv;
  /** Defaults for attempts, retries and backoff when a call does not set them */
  config?: Pick<HarnessConfig, 'maxAttempts' | 'maxRetries' | 'backoffBaseMs'>;
}

export interface PodLoopOptions {
  podDir: string;
  llmClient: LlmClientPort;
  llmConfig: LlmConfig;
  maxAttempts?: number;
  timeoutMs?: number;
  workerId?: string;
  signal?: AbortSignal;
}

export class Harness {
  readonly store: FileStorePort;
  readonly clock: ClockPort;
  readonly logger: LoggerPort;
  readonly namer: DirectoryNamer;
  readonly exchange: FeedbackExchange;
  readonly configLoader: ConfigLoader;
  readonly config: HarnessOptions['config'];

  constructor(options: HarnessOptions = {}) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
    this.store = options.store ?? new AtomicFileStore(this.logger);
    this.namer = new DirectoryNamer({ clock: this.clock, idGenerator: options.idGenerator, logger: this.logger });
    this.exchange = new FeedbackExchange(this.store, this.namer, this.clock, this.logger);
    this.configLoader = new ConfigLoader(this.store, options.baseDir, options.env, this.logger);
  }

  /**
   * A fresh supervisor, worker and loop for one pod
   */
  createPodLoop(options: PodLoopOptions): FeedbackLoop {
    const supervisor = new SupervisorEvaluation(
      this.exchange,
      new RequirementComparator(this.logger),
      this.clock,
      this.logger
    );
    const worker = new WorkerExecution(options.llmClient, options.llmConfig, this.logger);

    return new FeedbackLoop(
      { exchange: this.exchange, worker, supervisor, logger: this.logger },
      {
        podDir: options.podDir,
        podId: path.basename(options.podDir),
        maxAttempts: options.maxAttempts ?? this.config?.maxAttempts,
        timeoutMs: options.timeoutMs,
        workerId: options.workerId,
        signal: options.signal,
      }
    );
  }

  createOrchestrator(options: RetryOrchestratorOptions = {}): RetryOrchestrator {
    return new RetryOrchestrator(
      {
        namer: this.namer,
        exchange: this.exchange,
        configLoader: this.configLoader,
        store: this.store,
        logger: this.logger,
      },
      {
        ...options,
        maxRetries: options.maxRetries ?? this.config?.maxRetries,
        backoffBaseMs: options.backoffBaseMs ?? this.config?.backoffBaseMs,
      }
    );
  }
}
