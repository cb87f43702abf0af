import { describe, it, expect } from 'vitest';
import { PRIORITIES, comparePriority, isPriority, type Priority } from '../../../src/types';

describe('priority', () => {
  const ascending: Priority[] = ['Lowest', 'Low', 'Medium', 'High', 'Highest', 'Critical'];

  it('should order every level from Lowest to Critical', () => {
    for (let i = 0; i < ascending.length - 1; i++) {
      const lower = ascending[i];
      const higher = ascending[i + 1];
      if (!lower || !higher) throw new Error('missing priority');
      expect(comparePriority(lower, higher)).toBeLessThan(0);
    }
  });

  it('should be antisymmetric and zero only for equal levels', () => {
    for (const a of PRIORITIES) {
      for (const b of PRIORITIES) {
        expect(comparePriority(a, b) + comparePriority(b, a)).toBe(0);
        expect(comparePriority(a, b) === 0).toBe(a === b);
      }
    }
  });

  it('should sort a shuffled list into ascending order', () => {
    const shuffled: Priority[] = ['High', 'Critical', 'Lowest', 'Medium', 'Highest', 'Low'];

    expect([...shuffled].sort(comparePriority)).toEqual(ascending);
  });

  it('should recognise only the known names', () => {
    expect(isPriority('Critical')).toBe(true);
    expect(isPriority('critical')).toBe(false);
    expect(isPriority('Blocker')).toBe(false);
  });
});
