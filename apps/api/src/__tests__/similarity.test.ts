import { describe, it, expect } from 'vitest';
import { nameSimilarity, normalizePersonName } from '../utils/similarity';

describe('nameSimilarity', () => {
  it('scores one edit in ten characters at 0.9', () => {
    expect(nameSimilarity('John Smith', 'Jon Smith')).toBeCloseTo(0.9, 10);
  });

  it('ignores case and repeated whitespace', () => {
    expect(normalizePersonName('  JOHN   Smith ')).toBe('john smith');
    expect(nameSimilarity('JOHN  SMITH', 'john smith')).toBe(1);
  });

  it('scores blank names at zero', () => {
    expect(nameSimilarity('', 'John Smith')).toBe(0);
  });
});
