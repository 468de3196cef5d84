// Worker LLM configuration
// Validated once when it is loaded; the worker never sees a loose config map

import { z } from 'zod';
import { LlmProvider } from '../domain/agents/enums/provider';
import { ConfigError } from '../domain/types/errors';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_LLM_TIMEOUT_MS = 60000;

export const llmConfigSchema = z.object({
  provider: z.nativeEnum(LlmProvider),
  model: z.string().min(1),
  base_url: z.string().url().optional(),
  api_key_env: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type LlmConfigFile = z.infer<typeof llmConfigSchema>;

export interface LlmConfig {
  provider: LlmProvider;
  model: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  temperature?: number;
}

/**
 * Turn a validated config file into the runtime config, reading the API key from the environment
 */
export function resolveLlmConfig(file: LlmConfigFile, env: NodeJS.ProcessEnv = process.env): LlmConfig {
  let apiKey: string | undefined;
  if (file.api_key_env) {
    apiKey = env[file.api_key_env];
    if (!apiKey) {
      throw new ConfigError(`Environment variable '${file.api_key_env}' named by api_key_env is not set`);
    }
  }

  return {
    provider: file.provider,
    model: file.model,
    baseUrl: file.base_url ?? env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL,
    apiKey,
    timeoutMs: file.timeout ?? DEFAULT_LLM_TIMEOUT_MS,
    temperature: file.temperature,
  };
}
