import { describe, expect, it } from 'vitest';
import { FIXED_NOW } from '../../../__tests__/fixtures.js';
import { consecutiveGaps, windowRange } from '../DateMath.js';

describe('windowRange', () => {
  it('covers exactly the requested number of days', () => {
    expect(windowRange(FIXED_NOW, 30)).toEqual({ startDate: '2025-06-01', endDate: '2025-06-30' });
    expect(windowRange(FIXED_NOW, 90)).toEqual({ startDate: '2025-04-02', endDate: '2025-06-30' });
  });
});

describe('consecutiveGaps', () => {
  it('measures gaps after sorting', () => {
    expect(consecutiveGaps(['2025-03-15', '2025-03-01', '2025-04-14'])).toEqual([14, 30]);
  });
});
