import { WorkflowDependencyGraph } from '@/application/services/workflow/dependencyGraph';
import { ValidationError } from '@/domain/types/errors';
import { createMockLogger } from '@mocks/adapters/logger.mock';

describe('WorkflowDependencyGraph', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let graph: WorkflowDependencyGraph;

  beforeEach(() => {
    logger = createMockLogger();
    graph = new WorkflowDependencyGraph(logger);
  });

  it('should start every workflow as pending', () => {
    graph.addWorkflow('setup');
    graph.addWorkflow('build', ['setup']);

    expect(graph.getStatus('setup')).toBe('pending');
    expect(graph.getStatus('build')).toBe('pending');
    expect(graph.getDependencies('build')).toEqual(['setup']);
    expect(graph.getDependents('setup')).toEqual(['build']);
  });

  it('should report workflows it does not know as unknown', () => {
    expect(graph.getStatus('ghost')).toBe('unknown');
    expect(graph.wasCancelledDueToDependency('ghost')).toBe(false);
  });

  it('should reject a workflow added twice', () => {
    graph.addWorkflow('setup');

    expect(() => graph.addWorkflow('setup')).toThrow(ValidationError);
  });

  it('should cancel direct and indirect dependents of a failed workflow', () => {
    graph.addWorkflow('setup');
    graph.addWorkflow('build', ['setup']);
    graph.addWorkflow('deploy', ['build']);
    graph.addWorkflow('lint');

    const cancelled = graph.markFailed('setup', 'disk full');

    expect(cancelled).toEqual(['build', 'deploy']);
    expect(graph.getStatus('setup')).toBe('failed');
    expect(graph.wasCancelledDueToDependency('build')).toBe(true);
    expect(graph.wasCancelledDueToDependency('deploy')).toBe(true);
    expect(graph.getCancellationCause('deploy')).toBe('setup');
    expect(graph.getStatus('lint')).toBe('pending');
    expect(logger.log).toHaveBeenCalledWith('WorkflowDependencyGraph', 'Workflow setup failed', {
      reason: 'disk full',
      cancelled: ['build', 'deploy'],
    });
  });

  it('should leave completed dependents alone', () => {
    graph.addWorkflow('setup');
    graph.addWorkflow('report', ['setup']);
    graph.markCompleted('report');

    expect(graph.markFailed('setup')).toEqual([]);
    expect(graph.getStatus('report')).toBe('completed');
    expect(graph.wasCancelledDueToDependency('report')).toBe(false);
  });

  it('should refuse to mark a workflow it does not know', () => {
    expect(() => graph.markFailed('ghost')).toThrow("Workflow 'ghost' is not in the graph");
  });

  describe('validate', () => {
    it('should accept an acyclic graph', () => {
      graph.addWorkflow('a');
      graph.addWorkflow('b', ['a']);
      graph.addWorkflow('c', ['a', 'b']);

      expect(() => graph.validate()).not.toThrow();
    });

    it('should list unknown dependencies', () => {
      graph.addWorkflow('build', ['setup']);

      expect(() => graph.validate()).toThrow("Invalid workflow dependencies: build: unknown dependency 'setup'");
    });

    it('should name the cycle it finds', () => {
      graph.addWorkflow('a', ['b']);
      graph.addWorkflow('b', ['a']);

      expect(() => graph.validate()).toThrow('Invalid workflow dependencies: cycle: a -> b -> a');
    });
  });
});
