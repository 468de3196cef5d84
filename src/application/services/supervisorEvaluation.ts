// Supervisor Evaluation
// Binary PASS/FAIL verdict on a pod's result, written back as feedback.json
// History is kept in memory for debugging only

import * as path from 'path';
import { ClockPort } from '../../domain/ports/clock';
import { LoggerPort } from '../../domain/ports/logger';
import { EvaluationHistoryEntry, EvaluationVerdict, InstructionsDocument } from '../../domain/types/types';
import { NotFoundError, ValidationError } from '../../domain/types/errors';
import { FeedbackExchange } from './feedbackExchange';

export interface ResultEvaluator {
  evaluate(instructions: string, result: string | null): EvaluationVerdict;
}

/**
 * Text the comparator sees: strings as they are, other JSON values serialized
 */
export function resultToText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? null;
}

/**
 * Path of the pod's result file; output_path may not leave the pod directory
 */
export function resolveOutputPath(podDir: string, instructions: InstructionsDocument): string {
  const podRoot = path.resolve(podDir);
  const outputPath = path.resolve(podRoot, instructions.output_path);
  if (outputPath !== podRoot && !outputPath.startsWith(podRoot + path.sep)) {
    throw new ValidationError(`output_path '${instructions.output_path}' points outside pod directory ${podDir}`);
  }
  return outputPath;
}

export class SupervisorEvaluation {
  private history: EvaluationHistoryEntry[] = [];

  constructor(
    private exchange: FeedbackExchange,
    private evaluator: ResultEvaluator,
    private clock: ClockPort,
    private logger: LoggerPort
  ) {}

  /**
   * Evaluate a result for the given attempt and write PASS or FAIL feedback
   */
  async evaluate(
    instructions: string,
    result: unknown,
    podDir: string,
    podId: string,
    attempt: number
  ): Promise<EvaluationVerdict> {
    const resultText = resultToText(result);
    const verdict = this.evaluator.evaluate(instructions, resultText);

    if (verdict.status === 'PASS') {
      await this.exchange.writePass(result, attempt, podDir, podId);
      this.logger.log('SupervisorEvaluation', `Evaluation PASS for pod ${podId}`, { attempts: attempt });
    } else {
      await this.exchange.writeFail(verdict.gaps, attempt, podDir, podId);
      this.logger.log('SupervisorEvaluation', `Evaluation FAIL for pod ${podId}`, { attempt, gaps: verdict.gaps });
    }

    this.history.push({
      status: verdict.status,
      pod_id: podId,
      timestamp: this.clock.now(),
      instructions,
      result: resultText,
      gaps: verdict.status === 'FAIL' ? [...verdict.gaps] : [],
    });
    return verdict;
  }

  /**
   * Read instructions and result from the pod directory, then evaluate.
   * A missing result file is evaluated as no result.
   */
  async evaluatePod(podDir: string, podId: string, attempt: number): Promise<EvaluationVerdict> {
    const instructions = await this.exchange.readInstructions(podDir);
    const outputPath = resolveOutputPath(podDir, instructions);

    let result: unknown = null;
    try {
      result = (await this.exchange.readResult(path.dirname(outputPath), path.basename(outputPath))).result;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }

    return this.evaluate(instructions.instructions, result, podDir, podId, attempt);
  }

  getHistory(): EvaluationHistoryEntry[] {
    return this.history.map(entry => ({ ...entry, gaps: [...entry.gaps] }));
  }
}
