import { LlmProvider } from '../../../domain/agents/enums/provider';
import { LlmClientPort } from '../../../domain/ports/llmProvider';
import { LoggerPort } from '../../../domain/ports/logger';
import { defaultLogger } from '../../adapters/logging/loggerAdapter';
import { OllamaLlmClient } from './ollamaLlmClient';
import { StubLlmClient } from './stubLlmClient';

export function createLlmClient(provider: LlmProvider, logger: LoggerPort = defaultLogger): LlmClientPort {
  switch (provider) {
    case LlmProvider.OLLAMA:
      return new OllamaLlmClient(logger);
    case LlmProvider.STUB:
      return new StubLlmClient();
  }
}
