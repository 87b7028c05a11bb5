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

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ProtocolSequenceError,
  SchemaMismatchError,
  createVerticalPartition,
  type AttributeMetadata,
} from '../../../shared/src';
import { LocalPartitionService } from './LocalPartitionService';

const A: AttributeMetadata = { name: 'A', kind: 'nominal', nominalValues: ['a0', 'a1'] };
const B: AttributeMetadata = { name: 'B', kind: 'nominal', nominalValues: ['p', 'q'] };
const CLASS: AttributeMetadata = { name: 'class', kind: 'nominal', nominalValues: ['no', 'yes'] };

const rows = [
  [0, 0, 0],
  [0, 0, 1],
  [0, 1, 1],
  [1, 1, 1],
];

const owners = new Map([
  [0, 'party1'],
  [1, 'party2'],
  [2, 'party2'],
]);

function party1(): LocalPartitionService {
  return new LocalPartitionService('party1', createVerticalPartition(rows, [0]), new Map([[0, A]]), 2, owners);
}

function party2(): LocalPartitionService {
  return new LocalPartitionService(
    'party2',
    createVerticalPartition(rows, [1, 2]),
    new Map([
      [1, B],
      [2, CLASS],
    ]),
    2,
    owners
  );
}

describe('LocalPartitionService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts with every row in the root branch', () => {
    const service = party2();
    expect(service.rowCount).toBe(4);
    expect(service.rowsOf('root')).toEqual([0, 1, 2, 3]);
  });

  it('contributes the class tally and count matrices it owns', () => {
    const service = party2();
    expect(service.contribution('root', { kind: 'class' }, 2)).toEqual([1, 3]);
    expect(service.contribution('root', { kind: 'attribute', attributeIndex: 1 }, 4)).toEqual([1, 1, 0, 2]);
  });

  it('contributes nothing for columns owned elsewhere', () => {
    expect(party2().contribution('root', { kind: 'attribute', attributeIndex: 0 }, 4)).toEqual([]);
    expect(party1().contribution('root', { kind: 'class' }, 2)).toEqual([]);
  });

  it('contributes zeros for an owned column without the class beside it', () => {
    expect(party1().contribution('root', { kind: 'attribute', attributeIndex: 0 }, 4)).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(
      '[party1] Owns attribute 0 but not the class column; contributing zeros'
    );
  });

  it('rejects a round whose width does not match its counts', () => {
    expect(() => party2().contribution('root', { kind: 'class' }, 3)).toThrow(SchemaMismatchError);
  });

  it('routes rows on a split and follows assignments from elsewhere', () => {
    const owner = party2();
    const follower = party1();
    const assignments = owner.split('root', 1, ['root.0', 'root.1']);
    expect(assignments).toEqual({ children: [[0, 1], [2, 3]], unrouted: [] });

    follower.applyAssignments('root', ['root.0', 'root.1'], assignments);
    expect(follower.rowsOf('root.1')).toEqual([2, 3]);
    expect(() => follower.rowsOf('root')).toThrow(ProtocolSequenceError);
    expect(owner.branchCount).toBe(2);
  });

  it('answers later rounds from the child branch only', () => {
    const service = party2();
    service.split('root', 1, ['root.0', 'root.1']);
    expect(service.contribution('root.0', { kind: 'class' }, 2)).toEqual([1, 1]);
  });

  it('refuses to split on a column it does not hold', () => {
    expect(() => party1().split('root', 1, ['root.0', 'root.1'])).toThrow(ProtocolSequenceError);
  });

  it('refuses assignments that do not account for every row', () => {
    const service = party1();
    expect(() => service.applyAssignments('root', ['root.0', 'root.1'], { children: [[0], [1]], unrouted: [] })).toThrow(
      'Split of root routes 2 rows, the branch holds 4'
    );
    expect(() => service.applyAssignments('root', ['root.0'], { children: [[0, 1], [2, 3]], unrouted: [] })).toThrow(
      ProtocolSequenceError
    );
  });

  it('drops retired branches', () => {
    const service = party1();
    service.retire('root');
    expect(() => service.retire('root')).toThrow('party1 holds no branch root');
  });
});
