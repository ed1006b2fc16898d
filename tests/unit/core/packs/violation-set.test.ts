/**
 * Tests for ViolationSet.
 */
import { describe, it, expect } from 'vitest';
import { ViolationSet, violationKey } from '../../../../src/core/packs/violation-set.js';
import type { ViolationIdentifier } from '../../../../src/core/packs/types.js';

const identifier: ViolationIdentifier = {
  violationType: 'privacy',
  file: 'packs/foo/a.rb',
  constantName: '::Baz',
  referencingPackName: 'packs/foo',
  definingPackName: 'packs/baz',
};

describe('ViolationSet', () => {
  it('should compare identifiers by value', () => {
    const set = new ViolationSet([identifier]);

    expect(set.has({ ...identifier })).toBe(true);
    expect(set.has({ ...identifier, violationType: 'dependency' })).toBe(false);
  });

  it('should keep one copy of equal identifiers', () => {
    const set = new ViolationSet();
    set.add(identifier);
    set.add({ ...identifier });

    expect(set.size).toBe(1);
    expect([...set]).toEqual([identifier]);
    expect(set.values()).toEqual([identifier]);
  });

  it('should not confuse fields that concatenate to the same text', () => {
    const a = { ...identifier, file: 'ab', constantName: 'c' };
    const b = { ...identifier, file: 'a', constantName: 'bc' };

    expect(violationKey(a)).not.toBe(violationKey(b));
  });
});
