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
import { SchemaMismatchError } from '../errors';
import { SecureSum } from './secureSum';
import {
  SecureInformationGain,
  flattenCounts,
  gainRatio,
  informationGain,
  localCounts,
  splitInformation,
  unflattenCounts,
} from './secureInformationGain';

const total = (counts: number[][]) => counts.reduce((sum, row) => sum + row.reduce((s, n) => s + n, 0), 0);

describe('localCounts', () => {
  it('tallies co-occurrences and skips missing cells', () => {
    expect(localCounts([0, 1, 1, -1], [1, 0, 1, 1], 2, 2)).toEqual([
      [0, 1],
      [1, 1],
    ]);
  });

  it('skips values beyond the declared cardinality', () => {
    expect(localCounts([0, 3], [0, 0], 2, 1)).toEqual([[1], [0]]);
  });

  it('rejects columns of different lengths', () => {
    expect(() => localCounts([0, 1], [0], 2, 2)).toThrow(SchemaMismatchError);
  });

  it('rejects non-positive cardinalities', () => {
    expect(() => localCounts([], [], 0, 2)).toThrow(SchemaMismatchError);
    expect(() => localCounts([], [], 2, -1)).toThrow(SchemaMismatchError);
  });
});

describe('flattenCounts / unflattenCounts', () => {
  it('lays the matrix out row by row', () => {
    expect(flattenCounts([[1, 2], [3, 4], [5, 6]])).toEqual([1, 2, 3, 4, 5, 6]);
    expect(unflattenCounts([1, 2, 3, 4, 5, 6], 3, 2)).toEqual([[1, 2], [3, 4], [5, 6]]);
  });

  it('rejects a vector that does not fill the matrix', () => {
    expect(() => unflattenCounts([1, 2, 3], 2, 2)).toThrow(SchemaMismatchError);
  });
});

describe('informationGain', () => {
  it('is one bit for a split that separates two balanced classes', () => {
    expect(informationGain([[2, 0], [0, 2]], 4)).toBeCloseTo(1, 10);
  });

  it('is zero for an attribute independent of the class', () => {
    expect(informationGain([[1, 1], [1, 1]], 4)).toBe(0);
  });

  it('is zero with no instances', () => {
    expect(informationGain([[0, 0], [0, 0]], 0)).toBe(0);
  });

  it('matches a hand-computed value', () => {
    // H(1/4, 3/4) - 1/2 * H(1/2, 1/2)
    expect(informationGain([[1, 1], [0, 2]], 4)).toBeCloseTo(0.311278, 5);
  });

  it('stays between zero and the class entropy bound', () => {
    const matrix = fc.integer({ min: 2, max: 3 }).chain(classes =>
      fc.array(fc.array(fc.integer({ min: 0, max: 20 }), { minLength: classes, maxLength: classes }), {
        minLength: 2,
        maxLength: 4,
      })
    );
    fc.assert(
      fc.property(matrix, counts => {
        const n = total(counts);
        const gain = informationGain(counts, n);
        expect(gain).toBeGreaterThanOrEqual(0);
        expect(gain).toBeLessThanOrEqual(Math.log2(counts[0].length) + 1e-9);
        const ratio = gainRatio(gain, counts, n);
        expect(ratio).toBeGreaterThanOrEqual(0);
        expect(Number.isFinite(ratio)).toBe(true);
      })
    );
  });
});

describe('gainRatio', () => {
  it('divides by the split information', () => {
    const counts = [[1, 1], [0, 2]];
    expect(splitInformation(counts, 4)).toBe(1);
    expect(gainRatio(informationGain(counts, 4), counts, 4)).toBeCloseTo(0.311278, 5);
  });

  it('is zero when every row takes the same attribute value', () => {
    expect(gainRatio(0.5, [[2, 2], [0, 0]], 4)).toBe(0);
  });
});

describe('SecureInformationGain', () => {
  it('sums count matrices through a three-member ring', () => {
    const coordinator = new SecureInformationGain(new SecureSum('coordinator', 3));
    const party1 = new SecureInformationGain(new SecureSum('party1', 3));
    const party2 = new SecureInformationGain(new SecureSum('party2', 3));

    const pending = coordinator.initiateZeroCounts(4);
    let shares = coordinator.outgoingShares(pending);
    shares = party1.participateCounts(shares, flattenCounts([[1, 0], [0, 1]]));
    shares = party2.participateCounts(shares, flattenCounts([[2, 3], [0, 0]]));
    expect(unflattenCounts(coordinator.finalizeCounts(pending, shares), 2, 2)).toEqual([[3, 3], [0, 1]]);
  });

  it('never sends the masks', () => {
    const coordinator = new SecureInformationGain(new SecureSum('coordinator', 3));
    const [share] = coordinator.outgoingShares(coordinator.initiateZeroCounts(1));
    expect(Object.keys(share).sort()).toEqual(['initiatorId', 'partialSum', 'round']);
  });

  it('rejects local counts wider than the round', () => {
    const coordinator = new SecureInformationGain(new SecureSum('coordinator', 3));
    const party = new SecureInformationGain(new SecureSum('party1', 3));
    const shares = coordinator.outgoingShares(coordinator.initiateZeroCounts(2));
    expect(() => party.participateCounts(shares, [0, 0, 0, 0])).toThrow(SchemaMismatchError);
  });
});
