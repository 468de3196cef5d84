// Session Coordinator
// Runs the feedback loops of several pods side by side, one fresh loop per pod
// A pod waits for the pods it depends on; if one of them does not complete it is cancelled
// A pod that throws is marked ERROR; the other pods keep running

import { LoggerPort } from '../../domain/ports/logger';
import { LoopOutcome } from '../../domain/types/types';
import { ValidationError, errorMessage } from '../../domain/types/errors';
import { FeedbackLoop } from './feedbackLoop';
import { PerformanceTracker } from './performanceTracker';
import { PodMessageQueue } from './podMessageQueue';
import { PodStateManager } from './podStateManager';
import { WorkflowDependencyGraph } from './workflow/dependencyGraph';

export interface PodSpec {
  name: string;
  podDir: string;
  /** Pods that must complete before this one starts */
  dependsOn?: string[];
}

export type PodRunResult =
  | { name: string; status: 'COMPLETE' | 'FAILED'; outcome: LoopOutcome }
  | { name: string; status: 'ERROR'; error: string }
  | { name: string; status: 'CANCELLED'; reason: string };

export type FeedbackLoopFactory = (pod: PodSpec) => FeedbackLoop;

export interface SessionCoordinatorOptions {
  messages?: PodMessageQueue;
  tracker?: PerformanceTracker;
}

export class SessionCoordinator {
  /** A completed pod's outcome is sent here to each pod that depends on it */
  readonly messages: PodMessageQueue;
  readonly tracker: PerformanceTracker;

  constructor(
    private createLoop: FeedbackLoopFactory,
    private podStates: PodStateManager,
    private logger: LoggerPort,
    options: SessionCoordinatorOptions = {}
  ) {
    this.messages = options.messages ?? new PodMessageQueue(logger);
    this.tracker = options.tracker ?? new PerformanceTracker(logger);
  }

  async runPods(pods: PodSpec[]): Promise<PodRunResult[]> {
    const startTime = Date.now();
    const graph = new WorkflowDependencyGraph(this.logger);
    for (const pod of pods) {
      graph.addWorkflow(pod.name, pod.dependsOn);
    }
    // Unknown names and cycles would leave pods waiting forever
    graph.validate();
    for (const pod of pods) {
      this.podStates.registerPod(pod.name, pod.podDir);
    }

    const byName = new Map(pods.map(pod => [pod.name, pod]));
    const runs = new Map<string, Promise<PodRunResult>>();
    const schedule = (pod: PodSpec): Promise<PodRunResult> => {
      const existing = runs.get(pod.name);
      if (existing) {
        return existing;
      }
      const dependencies = (pod.dependsOn ?? []).map(name => {
        const dependency = byName.get(name);
        if (!dependency) {
          throw new ValidationError(`Pod '${pod.name}' depends on unknown pod '${name}'`);
        }
        return schedule(dependency);
      });
      const run = this.runAfterDependencies(pod, dependencies, graph);
      runs.set(pod.name, run);
      return run;
    };

    const results = await Promise.all(pods.map(schedule));

    this.logger.logPerformance('[SessionCoordinator] RunPods', Date.now() - startTime, {
      pods: pods.length,
      statuses: this.podStates.getAllStatuses(),
      slow_pods: this.tracker.getSlowOperations().map(timing => timing.name),
    });
    return results;
  }

  private async runAfterDependencies(
    pod: PodSpec,
    dependencies: Promise<PodRunResult>[],
    graph: WorkflowDependencyGraph
  ): Promise<PodRunResult> {
    await Promise.all(dependencies);

    if (graph.wasCancelledDueToDependency(pod.name)) {
      const reason = `dependency '${graph.getCancellationCause(pod.name) ?? 'unknown'}' did not complete`;
      this.podStates.updateStatus(pod.name, 'CANCELLED');
      return { name: pod.name, status: 'CANCELLED', reason };
    }

    const result = await this.runPod(pod);
    if (result.status === 'COMPLETE') {
      graph.markCompleted(pod.name);
      for (const dependent of graph.getDependents(pod.name)) {
        this.messages.send(pod.name, dependent, result.outcome);
      }
    } else {
      graph.markFailed(pod.name, result.status);
    }
    return result;
  }

  private async runPod(pod: PodSpec): Promise<PodRunResult> {
    this.podStates.updateStatus(pod.name, 'running');
    try {
      const outcome = await this.tracker.track(`pod:${pod.name}`, () => this.createLoop(pod).run());
      const status = outcome.status === 'PASS' ? 'COMPLETE' : 'FAILED';
      this.podStates.updateStatus(pod.name, status);
      return { name: pod.name, status, outcome };
    } catch (error) {
      this.logger.logError('SessionCoordinator', `Pod ${pod.name} errored`, error);
      this.podStates.updateStatus(pod.name, 'ERROR');
      return { name: pod.name, status: 'ERROR', error: errorMessage(error) };
    }
  }
}
