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

import {
  ProtocolSequenceError,
  SchemaMismatchError,
  flattenCounts,
  localCounts,
  numValues,
  partitionRows,
  tallyClasses,
  ROOT_BRANCH,
  type AttributeMetadata,
  type BranchAssignments,
  type CountQuery,
  type DataPartition,
} from '../../../shared/src';

/**
 * One party's rows, grouped by the tree branch they currently sit in.
 * Answers count queries for the attributes this party is the primary
 * owner of and routes rows when a split lands.
 */
export class LocalPartitionService {
  private readonly branches = new Map<string, number[]>();
  private readonly columnOf = new Map<number, number>();

  constructor(
    private readonly partyId: string,
    private readonly partition: DataPartition,
    private readonly attributes: ReadonlyMap<number, AttributeMetadata>,
    private readonly classIndex: number,
    private readonly primaryOwners: ReadonlyMap<number, string>
  ) {
    partition.attributeIndices.forEach((index, column) => this.columnOf.set(index, column));
    this.branches.set(
      ROOT_BRANCH,
      partition.rows.map((_, i) => i)
    );
  }

  get rowCount(): number {
    return this.partition.rows.length;
  }

  get branchCount(): number {
    return this.branches.size;
  }

  holds(attributeIndex: number): boolean {
    return this.columnOf.has(attributeIndex);
  }

  isPrimaryOwner(attributeIndex: number): boolean {
    return this.primaryOwners.get(attributeIndex) === this.partyId;
  }

  rowsOf(branchId: string): readonly number[] {
    const rows = this.branches.get(branchId);
    if (!rows) {
      throw new ProtocolSequenceError(`${this.partyId} holds no branch ${branchId}`);
    }
    return rows;
  }

  /**
   * This party's addends for one round. Empty means all zeros: only the
   * primary owner of the queried column contributes.
   */
  contribution(branchId: string, query: CountQuery, width: number): number[] {
    const rows = this.rowsOf(branchId);
    const attributeIndex = query.kind === 'class' ? this.classIndex : query.attributeIndex;
    if (!this.isPrimaryOwner(attributeIndex)) {
      return [];
    }

    let local: number[];
    if (query.kind === 'class') {
      local = tallyClasses(this.column(rows, this.classIndex), numValues(this.metadata(this.classIndex)));
    } else if (!this.holds(this.classIndex)) {
      console.warn(
        `[${this.partyId}] Owns attribute ${attributeIndex} but not the class column; contributing zeros`
      );
      return [];
    } else {
      local = flattenCounts(
        localCounts(
          this.column(rows, attributeIndex),
          this.column(rows, this.classIndex),
          numValues(this.metadata(attributeIndex)),
          numValues(this.metadata(this.classIndex))
        )
      );
    }

    if (local.length !== width) {
      throw new SchemaMismatchError(
        `${this.partyId} has ${local.length} counts for attribute ${attributeIndex}, the round carries ${width}`
      );
    }
    return local;
  }

  /** Routes a branch's rows by a column this party holds and moves them into the child branches. */
  split(branchId: string, attributeIndex: number, childBranchIds: readonly string[]): BranchAssignments {
    if (!this.holds(attributeIndex)) {
      throw new ProtocolSequenceError(`${this.partyId} does not hold attribute ${attributeIndex}`);
    }
    const column = this.columnIndex(attributeIndex);
    const assignments = partitionRows(
      this.rowsOf(branchId),
      row => this.partition.rows[row][column],
      numValues(this.metadata(attributeIndex))
    );
    this.applyAssignments(branchId, childBranchIds, assignments);
    return assignments;
  }

  applyAssignments(branchId: string, childBranchIds: readonly string[], assignments: BranchAssignments): void {
    const parentRows = this.rowsOf(branchId);
    if (assignments.children.length !== childBranchIds.length) {
      throw new ProtocolSequenceError(
        `Split of ${branchId} names ${childBranchIds.length} children but routes rows to ${assignments.children.length}`
      );
    }
    const routed = assignments.children.reduce((n, rows) => n + rows.length, assignments.unrouted.length);
    if (routed !== parentRows.length) {
      throw new ProtocolSequenceError(`Split of ${branchId} routes ${routed} rows, the branch holds ${parentRows.length}`);
    }
    childBranchIds.forEach((childId, i) => this.branches.set(childId, [...assignments.children[i]]));
    this.branches.delete(branchId);
  }

  retire(branchId: string): void {
    if (!this.branches.delete(branchId)) {
      throw new ProtocolSequenceError(`${this.partyId} holds no branch ${branchId}`);
    }
  }

  clear(): void {
    this.branches.clear();
  }

  private metadata(attributeIndex: number): AttributeMetadata {
    const metadata = this.attributes.get(attributeIndex);
    if (!metadata) {
      throw new SchemaMismatchError(`${this.partyId} has no metadata for attribute ${attributeIndex}`);
    }
    return metadata;
  }

  private columnIndex(attributeIndex: number): number {
    const column = this.columnOf.get(attributeIndex);
    if (column === undefined) {
      throw new SchemaMismatchError(`${this.partyId} does not hold attribute ${attributeIndex}`);
    }
    return column;
  }

  private column(rows: readonly number[], attributeIndex: number): number[] {
    const column = this.columnIndex(attributeIndex);
    return rows.map(row => this.partition.rows[row][column]);
  }
}
