// Workflow Dependency Graph
// A workflow that fails cancels everything that depends on it, directly or through another workflow

import { LoggerPort } from '../../../domain/ports/logger';
import { ValidationError } from '../../../domain/types/errors';

export type WorkflowNodeStatus = 'pending' | 'completed' | 'failed' | 'cancelled';

interface WorkflowNode {
  dependencies: string[];
  status: WorkflowNodeStatus;
  /** Failed workflow that caused the cancellation */
  cancelledBy?: string;
}

export class WorkflowDependencyGraph {
  private nodes = new Map<string, WorkflowNode>();

  constructor(private logger: LoggerPort) {}

  addWorkflow(name: string, dependencies: string[] = []): void {
    if (this.nodes.has(name)) {
      throw new ValidationError(`Workflow '${name}' is already in the graph`);
    }
    this.nodes.set(name, { dependencies: [...dependencies], status: 'pending' });
  }

  /**
   * Every dependency must name a workflow in the graph and no workflow may depend on itself
   */
  validate(): void {
    const errors: string[] = [];
    for (const [name, node] of this.nodes) {
      for (const dependency of node.dependencies) {
        if (!this.nodes.has(dependency)) {
          errors.push(`${name}: unknown dependency '${dependency}'`);
        }
      }
    }

    const visiting = new Set<string>();
    const done = new Set<string>();
    const visit = (name: string, trail: string[]): void => {
      if (done.has(name)) return;
      if (visiting.has(name)) {
        errors.push(`cycle: ${[...trail, name].join(' -> ')}`);
        return;
      }
      visiting.add(name);
      for (const dependency of this.nodes.get(name)?.dependencies ?? []) {
        if (this.nodes.has(dependency)) {
          visit(dependency, [...trail, name]);
        }
      }
      visiting.delete(name);
      done.add(name);
    };
    for (const name of this.nodes.keys()) {
      visit(name, []);
    }

    if (errors.length > 0) {
      throw new ValidationError('Invalid workflow dependencies', errors);
    }
  }

  markCompleted(name: string): void {
    this.getNode(name).status = 'completed';
  }

  /**
   * Mark a workflow failed and cancel its dependents; returns the names cancelled
   */
  markFailed(name: string, reason?: string): string[] {
    this.getNode(name).status = 'failed';

    const cancelled: string[] = [];
    const queue = [name];
    while (queue.length > 0) {
      const current = queue.shift() ?? '';
      for (const dependent of this.getDependents(current)) {
        const node = this.getNode(dependent);
        if (node.status !== 'pending') continue;
        node.status = 'cancelled';
        node.cancelledBy = name;
        cancelled.push(dependent);
        queue.push(dependent);
      }
    }

    this.logger.log('WorkflowDependencyGraph', `Workflow ${name} failed`, { reason: reason ?? null, cancelled });
    return cancelled;
  }

  getStatus(name: string): WorkflowNodeStatus | 'unknown' {
    return this.nodes.get(name)?.status ?? 'unknown';
  }

  wasCancelledDueToDependency(name: string): boolean {
    return this.nodes.get(name)?.status === 'cancelled';
  }

  getCancellationCause(name: string): string | undefined {
    return this.nodes.get(name)?.cancelledBy;
  }

  getDependencies(name: string): string[] {
    return [...(this.nodes.get(name)?.dependencies ?? [])];
  }

  getDependents(name: string): string[] {
    const dependents: string[] = [];
    for (const [candidate, node] of this.nodes) {
      if (node.dependencies.includes(name)) {
        dependents.push(candidate);
      }
    }
    return dependents;
  }

  private getNode(name: string): WorkflowNode {
    const node = this.nodes.get(name);
    if (!node) {
      throw new ValidationError(`Workflow '${name}' is not in the graph`);
    }
    return node;
  }
}
