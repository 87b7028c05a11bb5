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

import type { AttributeMetadata, BranchAssignments, LeafNode } from '../types';

export function childBranchId(branchId: string, valueIndex: number): string {
  return `${branchId}.${valueIndex}`;
}

export function tallyClasses(classValues: readonly number[], numClassValues: number): number[] {
  const distribution = new Array<number>(numClassValues).fill(0);
  for (const value of classValues) {
    if (Number.isInteger(value) && value >= 0 && value < numClassValues) {
      distribution[value]++;
    }
  }
  return distribution;
}

export function isHomogeneous(distribution: readonly number[]): boolean {
  return distribution.filter(n => n > 0).length <= 1;
}

/** Index of the most frequent class; ties and empty tallies go to the lowest index. */
export function majorityClass(distribution: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < distribution.length; i++) {
    if (distribution[i] > distribution[best]) best = i;
  }
  return best;
}

export function makeLeaf(classAttribute: AttributeMetadata, distribution: readonly number[]): LeafNode {
  const classIndex = majorityClass(distribution);
  return {
    kind: 'leaf',
    classLabel: classAttribute.nominalValues[classIndex] ?? String(classIndex),
    classIndex,
    classDistribution: [...distribution],
  };
}

/**
 * Routes each row to the child for its value. Rows whose value is missing
 * or outside the attribute's cardinality reach no indexed child.
 */
export function partitionRows(
  rowIndices: readonly number[],
  valueOf: (row: number) => number,
  numValues: number
): BranchAssignments {
  const children: number[][] = Array.from({ length: numValues }, () => []);
  const unrouted: number[] = [];
  for (const row of rowIndices) {
    const value = valueOf(row);
    if (Number.isInteger(value) && value >= 0 && value < numValues) {
      children[value].push(row);
    } else {
      unrouted.push(row);
    }
  }
  return { children, unrouted };
}
