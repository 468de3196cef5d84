// Pod State Manager
// In-memory status of every pod in a session

import { LoggerPort } from '../../domain/ports/logger';
import { PodStatus } from '../../domain/types/types';
import { ValidationError } from '../../domain/types/errors';

export interface PodRecord {
  name: string;
  podDir: string;
  status: PodStatus;
}

export class PodStateManager {
  private pods = new Map<string, PodRecord>();

  constructor(
    readonly sessionDir: string,
    private logger: LoggerPort
  ) {}

  registerPod(name: string, podDir: string): void {
    if (this.pods.has(name)) {
      throw new ValidationError(`Pod '${name}' is already registered`);
    }
    this.pods.set(name, { name, podDir, status: 'registered' });
    this.logger.logVerbose('PodStateManager', 'Pod registered', { name, pod_dir: podDir });
  }

  updateStatus(name: string, status: PodStatus): void {
    const record = this.pods.get(name);
    if (!record) {
      throw new ValidationError(`Pod '${name}' is not registered`);
    }
    this.logger.logStateTransition(record.status, status, { pod: name });
    record.status = status;
  }

  getStatus(name: string): PodStatus | 'unknown' {
    return this.pods.get(name)?.status ?? 'unknown';
  }

  getAllStatuses(): Record<string, PodStatus> {
    const statuses: Record<string, PodStatus> = {};
    for (const [name, record] of this.pods) {
      statuses[name] = record.status;
    }
    return statuses;
  }

  getPod(name: string): PodRecord | undefined {
    const record = this.pods.get(name);
    return record ? { ...record } : undefined;
  }
}
