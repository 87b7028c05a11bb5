/*!
 * Copyright (c) Shehan Edirimannage, 2025
 *
 * This file is part of the SecHeto-FL project.
 * 
 * Licensed for evaluation and personal testing purposes only.
 * Redistribution, modification, or commercial use of this file,
 * in whole or in part, is strictly prohibited without explicit 
 * written permission from the copyright holder.
 *
 * For license inquiries, contact developers.
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { childBranchId, isHomogeneous, majorityClass, makeLeaf, partitionRows, tallyClasses } from './branches';

const outlook = { name: 'play', kind: 'nominal' as const, nominalValues: ['no', 'yes'] };

describe('branch helpers', () => {
  it('names children by dotted path', () => {
    expect(childBranchId('root', 0)).toBe('root.0');
    expect(childBranchId('root.2', 1)).toBe('root.2.1');
  });

  it('tallies classes and ignores missing values', () => {
    expect(tallyClasses([0, 1, 1, -1, 5], 2)).toEqual([1, 2]);
  });

  it('treats empty and single-class tallies as homogeneous', () => {
    expect(isHomogeneous([0, 0])).toBe(true);
    expect(isHomogeneous([0, 4])).toBe(true);
    expect(isHomogeneous([1, 4])).toBe(false);
  });

  it('breaks majority ties toward the lowest index', () => {
    expect(majorityClass([2, 3, 3])).toBe(1);
    expect(majorityClass([0, 0])).toBe(0);
  });

  it('labels a leaf with the majority class', () => {
    expect(makeLeaf(outlook, [1, 3])).toEqual({
      kind: 'leaf',
      classLabel: 'yes',
      classIndex: 1,
      classDistribution: [1, 3],
    });
  });
});

describe('partitionRows', () => {
  it('routes rows by value and keeps missing ones apart', () => {
    const values = [2, 0, -1, 2, 1];
    expect(partitionRows([0, 1, 2, 3, 4], row => values[row], 3)).toEqual({
      children: [[1], [4], [0, 3]],
      unrouted: [2],
    });
  });

  it('places every row exactly once', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -1, max: 4 }), { maxLength: 40 }), values => {
        const rows = values.map((_, i) => i);
        const { children, unrouted } = partitionRows(rows, row => values[row], 4);
        const placed = [...children.flat(), ...unrouted].sort((a, b) => a - b);
        expect(placed).toEqual(rows);
      })
    );
  });
});
