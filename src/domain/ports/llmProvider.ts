// Port: LLM Provider
// Interface for the worker's LLM call

import { LlmConfig } from '../../config/llmConfig';

export interface LlmClientPort {
  /**
   * Send a prompt and return the response text.
   * Failures are raised as LlmError with a RATE_LIMIT, TIMEOUT or API kind.
   */
  call(prompt: string, config: LlmConfig): Promise<string>;
}
