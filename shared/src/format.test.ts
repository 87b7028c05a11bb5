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

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DataFormatError } from './errors';
import { loadModel, renderTree, saveModel, type SavedModel } from './format';
import type { AttributeMetadata, TreeNode } from './types';

const attributes: AttributeMetadata[] = [
  { name: 'A', kind: 'nominal', nominalValues: ['a0', 'a1'] },
  { name: 'B', kind: 'nominal', nominalValues: ['p', 'q'] },
  { name: 'class', kind: 'nominal', nominalValues: ['no', 'yes'] },
];

const splitOnB: TreeNode = {
  kind: 'nominal',
  splitAttribute: 'B',
  attributeIndex: 1,
  children: [
    { kind: 'leaf', classLabel: 'no', classIndex: 0, classDistribution: [2, 0] },
    { kind: 'leaf', classLabel: 'yes', classIndex: 1, classDistribution: [0, 2] },
  ],
  defaultChild: { kind: 'leaf', classLabel: 'no', classIndex: 0, classDistribution: [2, 2] },
};

describe('renderTree', () => {
  it('prints one line per branch with value names', () => {
    expect(renderTree(splitOnB, attributes)).toBe('B = p: no [2, 0]\nB = q: yes [0, 2]\nB = ?: no [2, 2]');
  });

  it('indents nested levels and falls back to value indices', () => {
    const nested: TreeNode = {
      kind: 'nominal',
      splitAttribute: 'route',
      attributeIndex: 0,
      children: [
        { kind: 'leaf', classLabel: 'no', classIndex: 0, classDistribution: [3, 0] },
        {
          kind: 'numeric',
          splitAttribute: 'load',
          attributeIndex: 1,
          threshold: 5,
          left: { kind: 'leaf', classLabel: 'yes', classIndex: 1, classDistribution: [0, 2] },
          right: { kind: 'leaf', classLabel: 'no', classIndex: 0, classDistribution: [1, 0] },
        },
      ],
    };
    expect(renderTree(nested)).toBe(
      ['route = 0: no [3, 0]', 'route = 1', '|   load <= 5: yes [0, 2]', '|   load > 5: no [1, 0]'].join('\n')
    );
  });

  it('prints a lone leaf without a condition', () => {
    expect(renderTree({ kind: 'leaf', classLabel: 'yes', classIndex: 1, classDistribution: [0, 1] })).toBe(
      'yes [0, 1]'
    );
  });
});

describe('saveModel / loadModel', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vertical-tree-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads back what it wrote', () => {
    const model: SavedModel = { relation: 'toy', attributes, classIndex: 2, tree: splitOnB };
    const file = path.join(dir, 'tree.json');
    saveModel(file, model);
    expect(loadModel(file)).toEqual(model);
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'absent.json');
    expect(() => loadModel(file)).toThrow(`Tree file not found: ${file}`);
  });

  it('rejects files that are not a saved tree', () => {
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ not json');
    expect(() => loadModel(broken)).toThrow(DataFormatError);

    const wrongShape = path.join(dir, 'wrong.json');
    fs.writeFileSync(wrongShape, JSON.stringify({ relation: 'toy', tree: { kind: 'leaf' } }));
    expect(() => loadModel(wrongShape)).toThrow(DataFormatError);
  });
});
