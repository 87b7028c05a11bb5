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

import { MISSING_VALUE } from '../constants';
import { DataFormatError } from '../errors';
import type { AttributeMetadata, InternalNode, LeafNode, TreeNode } from '../types';

function fallback(node: InternalNode, reason: string): TreeNode {
  if (!node.defaultChild) {
    throw new DataFormatError(`No branch to follow at ${node.splitAttribute}: ${reason}`);
  }
  return node.defaultChild;
}

/** Walks the tree to the leaf the features reach. Missing features take the default child. */
export function classify(tree: TreeNode, features: ReadonlyMap<string, number>): LeafNode {
  let node = tree;
  while (node.kind !== 'leaf') {
    const value = features.get(node.splitAttribute);
    if (value === undefined || value === MISSING_VALUE) {
      node = fallback(node, `feature ${node.splitAttribute} is missing`);
    } else if (node.kind === 'numeric') {
      node = value <= node.threshold ? node.left : node.right;
    } else {
      const child = node.children[Math.round(value)];
      node = child ?? fallback(node, `value ${value} has no branch`);
    }
  }
  return node;
}

export function predict(tree: TreeNode, features: ReadonlyMap<string, number>): string {
  return classify(tree, features).classLabel;
}

/** Predicts a dataset row; columns are looked up by attribute name. */
export function predictRow(tree: TreeNode, attributes: readonly AttributeMetadata[], row: readonly number[]): string {
  const features = new Map<string, number>();
  attributes.forEach((attribute, i) => {
    if (row[i] !== undefined && row[i] !== MISSING_VALUE) {
      features.set(attribute.name, row[i]);
    }
  });
  return predict(tree, features);
}
