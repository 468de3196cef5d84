// Config Loader
// JSON config files with ${ENV_VAR} substitution and optional zod validation
// An undefined variable is a setup error, never retried

import * as path from 'path';
import { z } from 'zod';
import { FileStorePort } from '../../domain/ports/fileStore';
import { LoggerPort } from '../../domain/ports/logger';
import { ConfigError } from '../../domain/types/errors';
import { defaultLogger } from '../adapters/logging/loggerAdapter';

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export const CONFIGS_DIR = 'configs';

export class ConfigLoader {
  constructor(
    private store: FileStorePort,
    private baseDir: string = process.cwd(),
    private env: NodeJS.ProcessEnv = process.env,
    private logger: LoggerPort = defaultLogger
  ) {}

  async load(configPath: string): Promise<unknown>;
  async load<T extends z.ZodTypeAny>(configPath: string, schema: T): Promise<z.infer<T>>;
  async load(configPath: string, schema?: z.ZodTypeAny): Promise<unknown> {
    const resolved = path.resolve(this.baseDir, configPath);
    const config = this.substituteEnvVars(await this.store.read(resolved));

    if (!schema) {
      return config;
    }

    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // First problem only; later ones are usually consequences of it
      const issue = parsed.error.issues[0];
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      throw new ConfigError(`Config validation failed for ${resolved}: ${field}: ${issue.message}`);
    }

    this.logger.logVerbose('ConfigLoader', 'Config loaded', { config_path: resolved });
    return parsed.data;
  }

  async loadSupervisorConfig(podId: string): Promise<unknown> {
    return this.load(path.join(CONFIGS_DIR, `supervisor_${podId}.json`));
  }

  async loadWorkerConfig(podId: string, workerId: string): Promise<unknown> {
    return this.load(path.join(CONFIGS_DIR, `worker_${podId}_${workerId}.json`));
  }

  substituteEnvVars(data: unknown): unknown {
    if (Array.isArray(data)) {
      return data.map(item => this.substituteEnvVars(item));
    }
    if (typeof data === 'object' && data !== null) {
      return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, this.substituteEnvVars(value)]));
    }
    if (typeof data === 'string') {
      return data.replace(ENV_VAR_PATTERN, (_match, name: string) => {
        const value = this.env[name];
        if (value === undefined) {
          throw new ConfigError(`Environment variable '${name}' is not defined`);
        }
        return value;
      });
    }
    return data;
  }
}
