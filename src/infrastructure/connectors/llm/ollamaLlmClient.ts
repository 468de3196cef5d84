import { Ollama } from 'ollama';
import { LlmConfig } from '../../../config/llmConfig';
import { LlmClientPort } from '../../../domain/ports/llmProvider';
import { LoggerPort } from '../../../domain/ports/logger';
import { LlmError, LlmErrorKind, errorMessage } from '../../../domain/types/errors';
import { defaultLogger } from '../../adapters/logging/loggerAdapter';

function statusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status_code' in error && typeof error.status_code === 'number') {
    return error.status_code;
  }
  return undefined;
}

export function toLlmError(error: unknown): LlmError {
  if (error instanceof LlmError) {
    return error;
  }
  if (statusCode(error) === 429) {
    return new LlmError(LlmErrorKind.RATE_LIMIT, errorMessage(error), error);
  }
  return new LlmError(LlmErrorKind.API, errorMessage(error), error);
}

export class OllamaLlmClient implements LlmClientPort {
  constructor(private logger: LoggerPort = defaultLogger) {}

  async call(prompt: string, config: LlmConfig): Promise<string> {
    const startTime = Date.now();
    this.logger.logVerbose('OllamaLlmClient', 'Executing prompt', { model: config.model, prompt_length: prompt.length });

    // One client per call so abort() only cancels this request
    const client = new Ollama({
      host: config.baseUrl,
      headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : undefined,
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        client.abort();
        reject(new LlmError(LlmErrorKind.TIMEOUT, `no response from ${config.model} after ${config.timeoutMs}ms`));
      }, config.timeoutMs);
    });

    try {
      const response = await Promise.race([
        client.chat({
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          options: config.temperature === undefined ? undefined : { temperature: config.temperature },
        }),
        timeout,
      ]);

      this.logger.logPerformance('[OllamaLlmClient] Chat', Date.now() - startTime, {
        model: config.model,
        tokens: response.eval_count,
      });
      return response.message.content;
    } catch (error) {
      const llmError = toLlmError(error);
      this.logger.logVerbose('OllamaLlmClient', 'Execution failed', { kind: llmError.kind, error: llmError.detail });
      throw llmError;
    } finally {
      clearTimeout(timer);
    }
  }
}
