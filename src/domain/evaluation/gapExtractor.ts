// Gap Extractor - binary PASS/FAIL plus requirement gaps
// Only the exact string "PASS" succeeds; there is no partial credit

const STOP_WORDS: ReadonlySet<string> = new Set(['the', 'a', 'an', 'as', 'to', 'from', 'with', 'and', 'or', 'of']);

// Share of a requirement's key terms that must appear in the result
const MATCH_THRESHOLD = 0.5;

// Words that mark a result as prose rather than a bare number
const PROSE_INDICATORS = ['is', 'sum', 'the'];

const NUMBERED_PREFIX = /^\d+\.\s*/;

export class GapExtractor {
  isPass(result: unknown): boolean {
    return result === 'PASS';
  }

  /**
   * One requirement per non-blank line, with any "1. " prefix removed
   */
  extractRequirements(instructions: string): string[] {
    return instructions
      .trim()
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .map(line => line.replace(NUMBERED_PREFIX, ''))
      .filter(line => line.length > 0);
  }

  findGaps(requirements: string[], result: string): string[] {
    return requirements
      .filter(requirement => !this.isSatisfied(requirement, result))
      .map(requirement => `Missing requirement: ${requirement}`);
  }

  extractKeyTerms(requirement: string): string[] {
    return requirement
      .toLowerCase()
      .split(/\s+/)
      .filter(word => word.length > 0 && !STOP_WORDS.has(word));
  }

  private isSatisfied(requirement: string, result: string): boolean {
    const resultLower = result.toLowerCase();

    if (requirement.toLowerCase().includes('integer') && !this.hasIntegerFormat(result, resultLower)) {
      return false;
    }

    const keyTerms = this.extractKeyTerms(requirement);
    const matches = keyTerms.filter(term => resultLower.includes(term)).length;
    return matches >= keyTerms.length * MATCH_THRESHOLD;
  }

  private hasIntegerFormat(result: string, resultLower: string): boolean {
    if (!/\d/.test(result)) {
      return false;
    }
    return !PROSE_INDICATORS.some(indicator => resultLower.includes(indicator));
  }
}
