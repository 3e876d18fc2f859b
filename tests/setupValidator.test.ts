import { validateSetup } from '../src/risk/setupValidator';
import { makeCandidate, makeConfig } from './fixtures';

const filters = makeConfig().setupFilters;

describe('validateSetup', () => {
  it('passes a candidate that clears every filter', () => {
    const result = validateSetup(makeCandidate(), filters);
    expect(result.pass).toBe(true);
    expect(result.reasonCodes).toEqual([]);
    expect(result.candidate?.correlationId).toBe('setup-1');
    expect(Object.isFrozen(result.candidate)).toBe(true);
  });

  it('rejects low confidence with a single reason', () => {
    const result = validateSetup(makeCandidate({ confidence: 0.5 }), filters);
    expect(result.pass).toBe(false);
    expect(result.reasonCodes).toEqual(['LOW_CONFIDENCE']);
  });

  it('accepts a confidence exactly at the threshold', () => {
    expect(validateSetup(makeCandidate({ confidence: 0.65 }), filters).pass).toBe(true);
  });

  it('accumulates every failing filter in a fixed order', () => {
    const result = validateSetup(
      makeCandidate({ confidence: 0.4, rewardRisk: 1.2, setupType: 'Counter_Trend' }),
      filters
    );
    expect(result.reasonCodes).toEqual(['LOW_CONFIDENCE', 'LOW_REWARD_RISK', 'EXCLUDED_SETUP_TYPE']);
  });

  it('treats NaN confidence as malformed and skips the filters', () => {
    const result = validateSetup({ ...makeCandidate(), confidence: Number.NaN, rewardRisk: 0.1 }, filters);
    expect(result.pass).toBe(false);
    expect(result.reasonCodes).toEqual(['MALFORMED_INPUT']);
    if (!result.pass) {
      expect(result.issues).toEqual(['confidence: Expected number, received nan']);
      expect(result.candidate).toBeUndefined();
    }
  });

  it('treats a missing field as malformed', () => {
    const partial: Record<string, unknown> = { ...makeCandidate() };
    delete partial.stopDistance;
    const result = validateSetup(partial, filters);
    expect(result.reasonCodes).toEqual(['MALFORMED_INPUT']);
    if (!result.pass) expect(result.issues).toEqual(['stopDistance: Required']);
  });

  it('treats a non-object payload as malformed', () => {
    expect(validateSetup(null, filters).reasonCodes).toEqual(['MALFORMED_INPUT']);
    expect(validateSetup('buy now', filters).reasonCodes).toEqual(['MALFORMED_INPUT']);
  });

  it('rejects an unknown direction as malformed', () => {
    expect(validateSetup({ ...makeCandidate(), direction: 'UP' }, filters).reasonCodes).toEqual(['MALFORMED_INPUT']);
  });
});
