import { findMissingItems, NO_RESULT_GAP, RequirementComparator } from '@/domain/evaluation/requirementComparator';
import { createMockLogger } from '@mocks/adapters/logger.mock';

describe('findMissingItems', () => {
  it('should list numbered items absent from the result', () => {
    expect(findMissingItems('Answer with 1) answer, 2) explanation', 'answer: 4')).toEqual(['explanation']);
  });

  it('should fall back to colon lists', () => {
    expect(findMissingItems('Provide fields: name, age', 'name is Bob')).toEqual(['age']);
  });

  it('should return nothing when every item is present', () => {
    expect(findMissingItems('Provide fields: name, age', 'NAME and AGE')).toEqual([]);
  });
});

describe('RequirementComparator', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let comparator: RequirementComparator;

  beforeEach(() => {
    logger = createMockLogger();
    comparator = new RequirementComparator(logger);
  });

  it.each([['Anything'], ['Return JSON with 1) answer'], ['']])('should pass the exact string PASS for %p', instructions => {
    expect(comparator.evaluate(instructions, 'PASS')).toEqual({ status: 'PASS', gaps: [] });
  });

  it.each([[null], [undefined], [''], ['   ']])('should report a missing result for %p', result => {
    expect(comparator.evaluate('Compute 2+2', result)).toEqual({ status: 'FAIL', gaps: [NO_RESULT_GAP] });
  });

  it('should report malformed JSON when JSON was asked for', () => {
    expect(comparator.evaluate('Return a JSON object', 'not json')).toEqual({
      status: 'FAIL',
      gaps: ['Malformed result: not json'],
    });
  });

  it('should report missing enumerated items', () => {
    expect(comparator.evaluate('Answer with 1) answer, 2) explanation', 'answer: 4')).toEqual({
      status: 'FAIL',
      gaps: ['Incomplete result: missing explanation'],
    });
  });

  it('should report requirement gaps for unmatched results', () => {
    expect(comparator.evaluate('Compute 2+2', '5')).toEqual({
      status: 'FAIL',
      gaps: ['Missing requirement: Compute 2+2'],
    });
  });

  it('should still fail with a specific gap when every requirement looks covered', () => {
    expect(comparator.evaluate('say hello world', 'hello world')).toEqual({
      status: 'FAIL',
      gaps: ['Incorrect result: hello world'],
    });
  });

  it('should never return a FAIL without gaps', () => {
    const results = ['x', 'PASS!', '{"a":1}', 'answer explanation', '0'];
    for (const result of results) {
      const verdict = comparator.evaluate('Return JSON with 1) answer, 2) explanation', result);
      expect(verdict.status).toBe('FAIL');
      expect(verdict.gaps.length).toBeGreaterThan(0);
    }
  });

  it('should log the verdict', () => {
    comparator.evaluate('Compute 2+2', '5');

    expect(logger.logVerbose).toHaveBeenCalledWith('RequirementComparator', 'Evaluation: FAIL', {
      instructions: 'Compute 2+2',
      result: '5',
      gaps: ['Missing requirement: Compute 2+2'],
    });
  });
});
