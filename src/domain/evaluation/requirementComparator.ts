// Requirement Comparator - evaluates a result against its instructions
// Gap text feeds the next worker prompt verbatim, so every FAIL carries at least one specific gap

import { GapExtractor } from './gapExtractor';
import { LoggerPort } from '../ports/logger';
import { EvaluationVerdict } from '../types/types';

export const NO_RESULT_GAP = 'No result provided';

const NUMBERED_ITEM_PATTERN = /\d+\)\s*([a-z][a-z0-9\s]*?)(?:,|\d+\)|$)/g;
const COLON_LIST_PATTERN = /:\s*([a-z_][a-z0-9_,\s]*)/g;

function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Items named in an enumerated instruction ("1) answer, 2) explanation" or
 * "fields: name, age") that do not appear in the result
 */
export function findMissingItems(instructions: string, result: string): string[] {
  const instructionsLower = instructions.toLowerCase();
  const resultLower = result.toLowerCase();

  const missing: string[] = [];
  for (const match of instructionsLower.matchAll(NUMBERED_ITEM_PATTERN)) {
    const item = match[1].trim();
    if (item && !resultLower.includes(item)) {
      missing.push(item);
    }
  }
  if (missing.length > 0) {
    return missing;
  }

  for (const match of instructionsLower.matchAll(COLON_LIST_PATTERN)) {
    for (const rawItem of match[1].split(',')) {
      const item = rawItem.trim();
      if (item && !resultLower.includes(item)) {
        missing.push(item);
      }
    }
  }
  return missing;
}

export class RequirementComparator {
  constructor(
    private logger: LoggerPort,
    private gapExtractor: GapExtractor = new GapExtractor()
  ) {}

  evaluate(instructions: string, result: string | null | undefined): EvaluationVerdict {
    const startTime = Date.now();

    if (this.gapExtractor.isPass(result)) {
      this.logger.logVerbose('RequirementComparator', 'Evaluation: PASS', { instructions, result, gaps: [] });
      return { status: 'PASS', gaps: [] };
    }

    const gaps = this.determineGaps(instructions, result);
    this.logger.logVerbose('RequirementComparator', 'Evaluation: FAIL', { instructions, result, gaps });
    this.logger.logPerformance('[RequirementComparator] Evaluate', Date.now() - startTime, { gap_count: gaps.length });
    return { status: 'FAIL', gaps };
  }

  private determineGaps(instructions: string, result: string | null | undefined): string[] {
    if (result === null || result === undefined || result.trim() === '') {
      return [NO_RESULT_GAP];
    }

    if (instructions.toLowerCase().includes('json') && !isValidJson(result)) {
      return [`Malformed result: ${result}`];
    }

    if (instructions.includes(':') || instructions.includes(')')) {
      const missingItems = findMissingItems(instructions, result);
      if (missingItems.length > 0) {
        return [`Incomplete result: missing ${missingItems.join(', ')}`];
      }
    }

    const requirements = this.gapExtractor.extractRequirements(instructions);
    const gaps = requirements.length > 0 ? this.gapExtractor.findGaps(requirements, result) : [];
    return gaps.length > 0 ? gaps : [`Incorrect result: ${result}`];
  }
}
