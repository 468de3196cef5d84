// Worker Execution
// Turns instructions (and, on retries, the latest FAIL gaps) into one LLM call

import { LlmConfig } from '../../config/llmConfig';
import { buildFeedbackPrompt, buildInitialPrompt } from '../../domain/agents/promptBuilder';
import { RateLimitBackoff } from '../../domain/policies/retry/rateLimitBackoff';
import { LlmClientPort } from '../../domain/ports/llmProvider';
import { LoggerPort } from '../../domain/ports/logger';
import { WorkerPort } from '../../domain/ports/worker';
import { FailFeedback, InstructionsDocument } from '../../domain/types/types';

export interface WorkerExecutionOptions {
  /** Calls per prompt when the provider answers RATE_LIMIT; defaults to 3 */
  rateLimitAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class WorkerExecution implements WorkerPort {
  private executionCount = 0;
  private backoff: RateLimitBackoff;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private llmClient: LlmClientPort,
    private config: LlmConfig,
    private logger: LoggerPort,
    options: WorkerExecutionOptions = {}
  ) {
    this.backoff = new RateLimitBackoff(options.rateLimitAttempts);
    this.sleep = options.sleep ?? sleep;
  }

  async execute(instructions: InstructionsDocument): Promise<string> {
    return this.callLlm(buildInitialPrompt(instructions), 'initial');
  }

  async executeWithFeedback(instructions: InstructionsDocument, feedback: FailFeedback): Promise<string> {
    this.logger.logVerbose('WorkerExecution', 'Retrying with feedback', {
      attempt: feedback.attempt,
      gap_count: feedback.gaps.length,
    });
    return this.callLlm(buildFeedbackPrompt(instructions, feedback), 'feedback');
  }

  getExecutionCount(): number {
    return this.executionCount;
  }

  private async callLlm(prompt: string, kind: 'initial' | 'feedback'): Promise<string> {
    const startTime = Date.now();
    this.executionCount += 1;

    const response = await this.callWithBackoff(prompt);

    this.logger.logPerformance('[WorkerExecution] LLM call', Date.now() - startTime, {
      kind,
      provider: this.config.provider,
      model: this.config.model,
      response_length: response.length,
    });
    return response;
  }

  private async callWithBackoff(prompt: string): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.llmClient.call(prompt, this.config);
      } catch (error) {
        if (!this.backoff.shouldRetry(error, attempt)) {
          throw error;
        }
        const delay = this.backoff.delayFor(attempt);
        this.logger.log(
          'WorkerExecution',
          `Rate limited - retry ${attempt + 1}/${this.backoff.maxAttempts} in ${delay}ms`,
          { provider: this.config.provider, model: this.config.model }
        );
        await this.sleep(delay);
      }
    }
  }
}
