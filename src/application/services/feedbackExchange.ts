// Feedback Exchange
// Produces and consumes instructions.json, result.json and feedback.json
// Every document is validated before it is written; invalid documents never reach disk

import * as path from 'path';
import { FileStorePort } from '../../domain/ports/fileStore';
import { ClockPort } from '../../domain/ports/clock';
import { LoggerPort } from '../../domain/ports/logger';
import {
  FEEDBACK_FILE,
  FailFeedback,
  FeedbackDocument,
  INSTRUCTIONS_FILE,
  InstructionsDocument,
  PassFeedback,
  RESULT_FILE,
  ResultDocument,
  ResultIdentity,
  ValidationOutcome,
  WORKERS_DIR,
} from '../../domain/types/types';
import { ValidationError, errorMessage } from '../../domain/types/errors';
import { failFeedbackSchema, instructionsSchema, passFeedbackSchema, resultSchema } from '../../domain/schemas/documents';
import { validateFeedback, validateInstructions, validateResult } from './schemaValidator';

export interface ProjectRootResolver {
  findProjectRoot(startPath: string): Promise<string>;
}

/**
 * null, undefined and blank strings carry no result
 */
export function isEmptyResult(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function assertValid(outcome: ValidationOutcome, label: string): void {
  if (!outcome.valid) {
    throw new ValidationError(`Invalid ${label}`, outcome.errors);
  }
}

export class FeedbackExchange {
  constructor(
    private store: FileStorePort,
    private rootResolver: ProjectRootResolver,
    private clock: ClockPort,
    private logger: LoggerPort
  ) {}

  /**
   * Write instructions.json once per pod. A second write is rejected.
   */
  async writeInstructions(text: string, podDir: string, sessionId: string): Promise<string> {
    if (!text || text.trim() === '') {
      throw new ValidationError('Invalid instructions document', ['instructions: must not be empty']);
    }

    const filePath = path.join(podDir, INSTRUCTIONS_FILE);
    if (await this.store.exists(filePath)) {
      throw new ValidationError(`Instructions already written: ${filePath}`);
    }

    const doc: InstructionsDocument = {
      instructions: text,
      output_path: RESULT_FILE,
      pod_id: path.basename(podDir),
      session_id: sessionId,
      project_root: await this.rootResolver.findProjectRoot(podDir),
      timestamp: this.clock.now(),
    };
    assertValid(validateInstructions(doc), 'instructions document');

    await this.store.writeAtomic(filePath, doc);
    this.logger.logVerbose('FeedbackExchange', 'Instructions written', { file: filePath, pod_id: doc.pod_id });
    return filePath;
  }

  async writeResult(
    value: unknown,
    dir: string,
    identity: ResultIdentity,
    fileName: string = RESULT_FILE
  ): Promise<string> {
    if (isEmptyResult(value)) {
      throw new ValidationError('Invalid result document', ['result: must not be empty']);
    }

    const doc: ResultDocument = {
      result: value,
      worker_id: identity.workerId,
      pod_id: identity.podId,
      session_id: identity.sessionId,
      timestamp: this.clock.now(),
    };
    assertValid(validateResult(doc), 'result document');

    const filePath = path.join(dir, fileName);
    await this.store.writeAtomic(filePath, doc);
    this.logger.logVerbose('FeedbackExchange', 'Result written', { file: filePath, worker_id: identity.workerId });
    return filePath;
  }

  /**
   * Delete a result left by an earlier attempt so it is not evaluated again
   */
  async clearResult(dir: string, fileName: string = RESULT_FILE): Promise<void> {
    const filePath = path.join(dir, fileName);
    await this.store.remove(filePath);
    this.logger.logVerbose('FeedbackExchange', 'Result cleared', { file: filePath });
  }

  async writePass(result: unknown, attempts: number, podDir: string, podId: string): Promise<string> {
    const doc: PassFeedback = {
      status: 'PASS',
      result,
      attempts,
      timestamp: this.clock.now(),
      pod_id: podId,
    };
    return this.writeFeedback(doc, podDir);
  }

  async writeFail(gaps: string[], attempt: number, podDir: string, podId: string): Promise<string> {
    const doc: FailFeedback = {
      status: 'FAIL',
      gaps,
      attempt,
      timestamp: this.clock.now(),
      pod_id: podId,
    };
    return this.writeFeedback(doc, podDir);
  }

  async readInstructions(podDir: string): Promise<InstructionsDocument> {
    const filePath = path.join(podDir, INSTRUCTIONS_FILE);
    const doc = await this.store.read(filePath);
    const parsed = instructionsSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ValidationError(`Invalid instructions document ${filePath}`, validateInstructions(doc).errors);
    }
    return parsed.data;
  }

  async readResult(dir: string, fileName: string = RESULT_FILE): Promise<ResultDocument> {
    const filePath = path.join(dir, fileName);
    const doc = await this.store.read(filePath);
    const parsed = resultSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ValidationError(`Invalid result document ${filePath}`, validateResult(doc).errors);
    }
    return { ...parsed.data, result: parsed.data.result };
  }

  /**
   * Latest feedback for the pod, or null when none has been written yet
   */
  async readFeedback(podDir: string): Promise<FeedbackDocument | null> {
    const filePath = path.join(podDir, FEEDBACK_FILE);
    if (!(await this.store.exists(filePath))) {
      return null;
    }

    const doc = await this.store.read(filePath);
    assertValid(validateFeedback(doc), `feedback document ${filePath}`);

    const fail = failFeedbackSchema.safeParse(doc);
    if (fail.success) {
      return { ...fail.data, status: 'FAIL' };
    }
    const pass = passFeedbackSchema.safeParse(doc);
    if (pass.success) {
      return { ...pass.data, status: 'PASS', result: pass.data.result };
    }
    throw new ValidationError(`Invalid feedback document ${filePath}`);
  }

  /**
   * Results of every worker under podDir/workers, in directory-name order.
   * Workers without a readable, valid result.json are skipped.
   */
  async aggregateWorkerResults(podDir: string): Promise<ResultDocument[]> {
    const workersDir = path.join(podDir, WORKERS_DIR);
    const workerNames = await this.store.listDirectories(workersDir);

    const results: ResultDocument[] = [];
    for (const workerName of workerNames) {
      const workerDir = path.join(workersDir, workerName);
      if (!(await this.store.exists(path.join(workerDir, RESULT_FILE)))) {
        continue;
      }
      try {
        results.push(await this.readResult(workerDir));
      } catch (error) {
        this.logger.logVerbose('FeedbackExchange', 'Skipping unreadable worker result', {
          worker_dir: workerDir,
          error: errorMessage(error),
        });
      }
    }

    this.logger.logVerbose('FeedbackExchange', 'Worker results aggregated', {
      pod_dir: podDir,
      workers: workerNames.length,
      results: results.length,
    });
    return results;
  }

  private async writeFeedback(doc: FeedbackDocument, podDir: string): Promise<string> {
    assertValid(validateFeedback(doc), 'feedback document');

    const filePath = path.join(podDir, FEEDBACK_FILE);
    await this.store.writeAtomic(filePath, doc);
    this.logger.logVerbose('FeedbackExchange', `Feedback written: ${doc.status}`, { file: filePath, pod_id: doc.pod_id });
    return filePath;
  }
}
