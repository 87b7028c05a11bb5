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

import { ROOT_BRANCH } from '../constants';
import { ProtocolSequenceError, SchemaMismatchError } from '../errors';
import { localCounts, type CountMatrix } from '../privacy/secureInformationGain';
import { numValues, type Dataset } from '../types';
import { childBranchId, partitionRows, tallyClasses } from './branches';
import type { SplitStatistics } from './treeBuilder';

/**
 * Statistics over a dataset held in one place. Used to train without a
 * ring and as the reference the distributed build is compared against.
 */
export class LocalStatistics implements SplitStatistics {
  private readonly branches = new Map<string, number[]>();

  constructor(private readonly dataset: Dataset) {
    this.branches.set(
      ROOT_BRANCH,
      dataset.rows.map((_, i) => i)
    );
  }

  rowsOf(branchId: string): readonly number[] {
    const rows = this.branches.get(branchId);
    if (!rows) {
      throw new ProtocolSequenceError(`Unknown branch ${branchId}`);
    }
    return rows;
  }

  async classDistribution(branchId: string): Promise<number[]> {
    const { classIndex, attributes, rows } = this.dataset;
    return tallyClasses(
      this.rowsOf(branchId).map(r => rows[r][classIndex]),
      numValues(attributes[classIndex])
    );
  }

  async attributeCounts(branchId: string, attributeIndex: number): Promise<CountMatrix> {
    const { classIndex, attributes, rows } = this.dataset;
    const attribute = attributes[attributeIndex];
    if (!attribute) {
      throw new SchemaMismatchError(`Attribute ${attributeIndex} is not in the schema`);
    }
    const branchRows = this.rowsOf(branchId);
    return localCounts(
      branchRows.map(r => rows[r][attributeIndex]),
      branchRows.map(r => rows[r][classIndex]),
      numValues(attribute),
      numValues(attributes[classIndex])
    );
  }

  async split(branchId: string, attributeIndex: number): Promise<string[]> {
    const assignments = partitionRows(
      this.rowsOf(branchId),
      row => this.dataset.rows[row][attributeIndex],
      numValues(this.dataset.attributes[attributeIndex])
    );
    return assignments.children.map((rows, value) => {
      const id = childBranchId(branchId, value);
      this.branches.set(id, rows);
      return id;
    });
  }

  async retire(branchId: string): Promise<void> {
    this.branches.delete(branchId);
  }
}
