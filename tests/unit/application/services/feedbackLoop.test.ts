import * as path from 'path';
import { FeedbackExchange } from '@/application/services/feedbackExchange';
import { FeedbackLoop, FeedbackLoopOptions, withTimeout } from '@/application/services/feedbackLoop';
import { ResultEvaluator, SupervisorEvaluation } from '@/application/services/supervisorEvaluation';
import { WorkerExecution } from '@/application/services/workerExecution';
import { LlmProvider } from '@/domain/agents/enums/provider';
import { buildFeedbackPrompt } from '@/domain/agents/promptBuilder';
import { RequirementComparator } from '@/domain/evaluation/requirementComparator';
import { WorkerPort } from '@/domain/ports/worker';
import { ConfigError, LlmError, NotFoundError, ValidationError, WorkflowAbortedError } from '@/domain/types/errors';
import { EvaluationVerdict } from '@/domain/types/types';
import { StubLlmClient } from '@/infrastructure/connectors/llm/stubLlmClient';
import { MemoryFileStore } from '@mocks/infrastructure/storage/memoryFileStore.mock';
import { FIXED_TIMESTAMP, FixedClock } from '@mocks/infrastructure/clock/fixedClock.mock';
import { createMockLogger } from '@mocks/adapters/logger.mock';

const POD_DIR = '/project/.agent-harness/sessions/s1/pods/pod-a';
const RESULT_PATH = path.join(POD_DIR, 'result.json');

describe('withTimeout', () => {
  it('should pass the result through when no timeout is set', async () => {
    await expect(withTimeout(Promise.resolve(4), undefined, 'work')).resolves.toBe(4);
  });

  it('should reject with a TIMEOUT error when the work is too slow', async () => {
    const error = await withTimeout(new Promise(() => undefined), 10, 'slow work').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ kind: 'TIMEOUT', detail: 'slow work exceeded 10ms' });
  });
});

describe('FeedbackLoop', () => {
  let store: MemoryFileStore;
  let logger: ReturnType<typeof createMockLogger>;
  let exchange: FeedbackExchange;
  let worker: jest.Mocked<WorkerPort>;

  beforeEach(async () => {
    store = new MemoryFileStore();
    logger = createMockLogger();
    exchange = new FeedbackExchange(store, { findProjectRoot: async () => '/project' }, new FixedClock(), logger);
    worker = { execute: jest.fn(), executeWithFeedback: jest.fn() };
    await exchange.writeInstructions('Compute 2+2', POD_DIR, 's1');
  });

  function createLoop(
    evaluator: ResultEvaluator = new RequirementComparator(logger),
    options: Partial<FeedbackLoopOptions> = {},
    loopWorker: WorkerPort = worker
  ): FeedbackLoop {
    const supervisor = new SupervisorEvaluation(exchange, evaluator, new FixedClock(), logger);
    return new FeedbackLoop(
      { exchange, worker: loopWorker, supervisor, logger },
      { podDir: POD_DIR, podId: 'pod-a', ...options }
    );
  }

  it('should reject a non-positive attempt limit', () => {
    expect(() => createLoop(undefined, { maxAttempts: 0 })).toThrow(ConfigError);
  });

  it('should pass on the second attempt after feedback', async () => {
    const evaluate = jest
      .fn<EvaluationVerdict, [string, string | null]>()
      .mockReturnValueOnce({ status: 'FAIL', gaps: ['Incorrect result: 5'] })
      .mockReturnValueOnce({ status: 'PASS', gaps: [] });
    worker.execute.mockResolvedValue('5');
    worker.executeWithFeedback.mockResolvedValue('4');
    const loop = createLoop({ evaluate });

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'PASS', attempts: 2, result: '4' });
    expect(evaluate.mock.calls).toEqual([
      ['Compute 2+2', '5'],
      ['Compute 2+2', '4'],
    ]);
    expect(worker.executeWithFeedback).toHaveBeenCalledWith(expect.objectContaining({ instructions: 'Compute 2+2' }), {
      status: 'FAIL',
      gaps: ['Incorrect result: 5'],
      attempt: 1,
      timestamp: FIXED_TIMESTAMP,
      pod_id: 'pod-a',
    });
    await expect(exchange.readFeedback(POD_DIR)).resolves.toEqual({
      status: 'PASS',
      result: '4',
      attempts: 2,
      timestamp: FIXED_TIMESTAMP,
      pod_id: 'pod-a',
    });
    expect(loop.getStatus()).toBe('COMPLETE');
    expect(loop.getHistory()).toEqual([{ attempt: 1, status: 'FAIL', gaps: ['Incorrect result: 5'] }]);
    expect(loop.getIterationCount()).toBe(2);
  });

  it('should return the structured result once the supervisor passes it', async () => {
    const podDir = '/project/pods/answer';
    store.putRaw(
      path.join(podDir, 'instructions.json'),
      JSON.stringify({ instructions: 'Return the number 42', output_path: 'result.json' })
    );
    const evaluate = jest
      .fn<EvaluationVerdict, [string, string | null]>()
      .mockReturnValueOnce({ status: 'FAIL', gaps: ['Incorrect result: {"result":"42"}'] })
      .mockReturnValueOnce({ status: 'PASS', gaps: [] });
    worker.execute.mockResolvedValue({ result: '42' });
    worker.executeWithFeedback.mockResolvedValue({ result: '42' });
    const supervisor = new SupervisorEvaluation(exchange, { evaluate }, new FixedClock(), logger);
    const loop = new FeedbackLoop({ exchange, worker, supervisor, logger }, { podDir, podId: 'answer' });

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'PASS', attempts: 2, result: { result: '42' } });
    expect(evaluate).toHaveBeenLastCalledWith('Return the number 42', '{"result":"42"}');
  });

  it('should stop after the attempt limit when the result never passes', async () => {
    worker.execute.mockResolvedValue('5');
    worker.executeWithFeedback.mockResolvedValue('5');
    const loop = createLoop();

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'FAIL', reason: 'MAX_ATTEMPTS_EXCEEDED', attempts: 3 });
    expect(worker.execute).toHaveBeenCalledTimes(1);
    expect(worker.executeWithFeedback).toHaveBeenCalledTimes(2);
    expect(loop.getHistory().map(entry => entry.attempt)).toEqual([1, 2, 3]);
    expect(loop.getStatus()).toBe('FAILED');
    await expect(exchange.readFeedback(POD_DIR)).resolves.toMatchObject({
      status: 'FAIL',
      gaps: ['Missing requirement: Compute 2+2'],
      attempt: 3,
    });
  });

  it('should write the result before evaluating it', async () => {
    worker.execute.mockResolvedValue('PASS');
    const loop = createLoop();

    await loop.run();

    expect(store.writes).toEqual([
      path.join(POD_DIR, 'instructions.json'),
      RESULT_PATH,
      path.join(POD_DIR, 'feedback.json'),
    ]);
    await expect(exchange.readResult(POD_DIR)).resolves.toEqual({
      result: 'PASS',
      worker_id: 'worker',
      pod_id: 'pod-a',
      session_id: 's1',
      timestamp: FIXED_TIMESTAMP,
    });
  });

  it('should evaluate an empty worker result as no result without writing it', async () => {
    worker.execute.mockResolvedValue('   ');
    const loop = createLoop(undefined, { maxAttempts: 1 });

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'FAIL', reason: 'MAX_ATTEMPTS_EXCEEDED', attempts: 1 });
    expect(store.getRaw(RESULT_PATH)).toBeUndefined();
    await expect(exchange.readFeedback(POD_DIR)).resolves.toMatchObject({ gaps: ['No result provided'] });
  });

  it('should drop the previous result when a retry comes back empty', async () => {
    worker.execute.mockResolvedValue('5');
    worker.executeWithFeedback.mockResolvedValue('  ');
    const loop = createLoop(undefined, { maxAttempts: 2 });

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'FAIL', reason: 'MAX_ATTEMPTS_EXCEEDED', attempts: 2 });
    expect(store.getRaw(RESULT_PATH)).toBeUndefined();
    await expect(exchange.readFeedback(POD_DIR)).resolves.toMatchObject({
      status: 'FAIL',
      gaps: ['No result provided'],
      attempt: 2,
    });
  });

  it('should re-evaluate the result on disk without calling the worker when no FAIL feedback is found', async () => {
    const evaluate = jest
      .fn<EvaluationVerdict, [string, string | null]>()
      .mockReturnValueOnce({ status: 'FAIL', gaps: ['Incorrect result: 5'] })
      .mockReturnValueOnce({ status: 'PASS', gaps: [] });
    worker.execute.mockResolvedValue('5');
    const readFeedback = exchange.readFeedback.bind(exchange);
    jest.spyOn(exchange, 'readFeedback').mockImplementationOnce(async podDir => {
      await store.remove(path.join(podDir, 'feedback.json'));
      return readFeedback(podDir);
    });
    const loop = createLoop({ evaluate }, { maxAttempts: 2 });

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'PASS', attempts: 2, result: '5' });
    expect(worker.execute).toHaveBeenCalledTimes(1);
    expect(worker.executeWithFeedback).not.toHaveBeenCalled();
    expect(evaluate.mock.calls).toEqual([
      ['Compute 2+2', '5'],
      ['Compute 2+2', '5'],
    ]);
    expect(logger.logVerbose).toHaveBeenCalledWith('FeedbackLoop', 'No FAIL feedback before retry, skipping worker', {
      pod_id: 'pod-a',
      attempt: 2,
    });
  });

  it('should end the loop as a timeout when the worker is too slow', async () => {
    worker.execute.mockReturnValue(new Promise(() => undefined));
    const loop = createLoop(undefined, { timeoutMs: 20 });

    const outcome = await loop.run();

    expect(outcome).toEqual({
      status: 'FAIL',
      reason: 'timeout: worker attempt 1 for pod pod-a exceeded 20ms',
      attempts: 1,
    });
    expect(loop.getStatus()).toBe('FAILED');
  });

  it('should fail before running when the instructions are missing', async () => {
    const loop = new FeedbackLoop(
      {
        exchange,
        worker,
        supervisor: new SupervisorEvaluation(exchange, new RequirementComparator(logger), new FixedClock(), logger),
        logger,
      },
      { podDir: '/project/other-pod', podId: 'other-pod' }
    );

    await expect(loop.run()).rejects.toBeInstanceOf(NotFoundError);
    expect(loop.getStatus()).toBe('idle');
    expect(worker.execute).not.toHaveBeenCalled();
  });

  it('should propagate worker errors and mark the loop failed', async () => {
    worker.execute.mockRejectedValue(new Error('connection refused'));
    const loop = createLoop();

    await expect(loop.run()).rejects.toThrow('connection refused');
    expect(loop.getStatus()).toBe('FAILED');
    expect(logger.logError).toHaveBeenCalledWith('FeedbackLoop', 'Pod pod-a failed on attempt 1', expect.any(Error));
  });

  it('should stop before the next attempt once aborted', async () => {
    const controller = new AbortController();
    worker.execute.mockImplementation(async () => {
      controller.abort();
      return '5';
    });
    const loop = createLoop(undefined, { signal: controller.signal });

    await expect(loop.run()).rejects.toBeInstanceOf(WorkflowAbortedError);
    expect(loop.getCurrentAttempt()).toBe(1);
    expect(worker.executeWithFeedback).not.toHaveBeenCalled();
  });

  it('should refuse an output path outside the pod directory', async () => {
    const otherPod = '/project/pods/escape';
    store.putRaw(
      path.join(otherPod, 'instructions.json'),
      JSON.stringify({ instructions: 'Compute 2+2', output_path: '../stolen.json' })
    );
    worker.execute.mockResolvedValue('4');
    const supervisor = new SupervisorEvaluation(exchange, new RequirementComparator(logger), new FixedClock(), logger);
    const loop = new FeedbackLoop({ exchange, worker, supervisor, logger }, { podDir: otherPod, podId: 'escape' });

    await expect(loop.run()).rejects.toBeInstanceOf(ValidationError);
    expect(store.getRaw('/project/pods/stolen.json')).toBeUndefined();
  });

  it('should feed the gaps into the next prompt when driven by an LLM client', async () => {
    const llmClient = new StubLlmClient(['5', 'PASS']);
    const llmWorker = new WorkerExecution(
      llmClient,
      { provider: LlmProvider.STUB, model: 'stub', baseUrl: 'http://localhost:11434', timeoutMs: 1000 },
      logger
    );
    const loop = createLoop(undefined, {}, llmWorker);

    const outcome = await loop.run();

    expect(outcome).toEqual({ status: 'PASS', attempts: 2, result: 'PASS' });
    const instructions = await exchange.readInstructions(POD_DIR);
    expect(llmClient.getPrompts()).toEqual([
      'Compute 2+2',
      buildFeedbackPrompt(instructions, {
        status: 'FAIL',
        gaps: ['Missing requirement: Compute 2+2'],
        attempt: 1,
        timestamp: FIXED_TIMESTAMP,
        pod_id: 'pod-a',
      }),
    ]);
    expect(llmWorker.getExecutionCount()).toBe(2);
  });
});
