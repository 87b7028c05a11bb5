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

import { SPLIT_INFO_EPSILON } from '../constants';
import { SchemaMismatchError } from '../errors';
import type { SecureSum, SecureSumShare, SecureSumState } from './secureSum';

export type CountMatrix = number[][];

function checkCardinality(label: string, cardinality: number): void {
  if (!Number.isInteger(cardinality) || cardinality <= 0) {
    throw new SchemaMismatchError(`${label} cardinality must be a positive integer, got ${cardinality}`);
  }
}

/**
 * Tallies attribute-value x class-value co-occurrences by row position.
 * Cells outside either declared cardinality (missing values included) are
 * skipped rather than rejected.
 */
export function localCounts(
  attributeValues: readonly number[],
  classValues: readonly number[],
  numAttributeValues: number,
  numClassValues: number
): CountMatrix {
  if (attributeValues.length !== classValues.length) {
    throw new SchemaMismatchError(
      `Attribute column has ${attributeValues.length} rows but class column has ${classValues.length}`
    );
  }
  checkCardinality('Attribute', numAttributeValues);
  checkCardinality('Class', numClassValues);

  const counts: CountMatrix = Array.from({ length: numAttributeValues }, () =>
    new Array<number>(numClassValues).fill(0)
  );
  for (let i = 0; i < attributeValues.length; i++) {
    const a = attributeValues[i];
    const c = classValues[i];
    if (Number.isInteger(a) && Number.isInteger(c) && a >= 0 && a < numAttributeValues && c >= 0 && c < numClassValues) {
      counts[a][c]++;
    }
  }
  return counts;
}

export function flattenCounts(counts: CountMatrix): number[] {
  return counts.flatMap(row => row);
}

export function unflattenCounts(flat: readonly number[], numAttributeValues: number, numClassValues: number): CountMatrix {
  if (flat.length !== numAttributeValues * numClassValues) {
    throw new SchemaMismatchError(
      `Expected ${numAttributeValues * numClassValues} counts for a ${numAttributeValues}x${numClassValues} matrix, got ${flat.length}`
    );
  }
  const counts: CountMatrix = [];
  for (let i = 0; i < numAttributeValues; i++) {
    counts.push(flat.slice(i * numClassValues, (i + 1) * numClassValues));
  }
  return counts;
}

function entropyTerm(count: number, total: number): number {
  if (count <= 0 || total <= 0) return 0;
  const p = count / total;
  return -p * Math.log2(p);
}

function attributeTotals(counts: CountMatrix): number[] {
  return counts.map(row => row.reduce((sum, n) => sum + n, 0));
}

function classTotals(counts: CountMatrix): number[] {
  const totals = new Array<number>(counts[0]?.length ?? 0).fill(0);
  for (const row of counts) {
    row.forEach((n, j) => {
      totals[j] += n;
    });
  }
  return totals;
}

/** gain = H(class) - sum_v (n_v / N) * H(class | attr = v) */
export function informationGain(globalCounts: CountMatrix, totalInstances: number): number {
  if (totalInstances === 0 || globalCounts.length === 0) {
    return 0;
  }

  const classEntropy = classTotals(globalCounts).reduce((h, n) => h + entropyTerm(n, totalInstances), 0);

  let conditionalEntropy = 0;
  attributeTotals(globalCounts).forEach((rowTotal, i) => {
    if (rowTotal > 0) {
      const rowEntropy = globalCounts[i].reduce((h, n) => h + entropyTerm(n, rowTotal), 0);
      conditionalEntropy += (rowTotal / totalInstances) * rowEntropy;
    }
  });

  const gain = classEntropy - conditionalEntropy;
  // Rounding can leave a residue just below zero for independent splits
  return gain > 0 ? gain : 0;
}

export function splitInformation(globalCounts: CountMatrix, totalInstances: number): number {
  if (totalInstances === 0) return 0;
  return attributeTotals(globalCounts).reduce((h, n) => h + entropyTerm(n, totalInstances), 0);
}

export function gainRatio(gain: number, globalCounts: CountMatrix, totalInstances: number): number {
  const splitInfo = splitInformation(globalCounts, totalInstances);
  if (splitInfo < SPLIT_INFO_EPSILON) {
    return 0;
  }
  return gain / splitInfo;
}

/**
 * Count vectors summed through the batched secure sum. A matrix travels
 * flattened row-major so one ring pass carries every cell.
 */
export class SecureInformationGain {
  constructor(private readonly secureSum: SecureSum) {}

  get ringSize(): number {
    return this.secureSum.size;
  }

  /** Opens a round that adds nothing; the returned states keep their masks. */
  initiateZeroCounts(width: number): SecureSumState[] {
    return this.secureSum.initiateVector([], width);
  }

  /** The masked sums as they leave the initiator. */
  outgoingShares(states: readonly SecureSumState[]): SecureSumShare[] {
    return states.map(state => this.secureSum.toShare(state));
  }

  participateCounts<S extends SecureSumShare>(states: readonly S[], cells: readonly number[]): S[] {
    if (cells.length > states.length) {
      throw new SchemaMismatchError(`Local counts have ${cells.length} cells but the round carries ${states.length}`);
    }
    return this.secureSum.participateVector(states, cells);
  }

  /** Unmasks the shares that came back around the ring. */
  finalizeCounts(pending: readonly SecureSumState[], returned: readonly SecureSumShare[]): number[] {
    return this.secureSum.finalizeVector(this.secureSum.absorbVector(pending, returned));
  }
}
