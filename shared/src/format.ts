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
import { z } from 'zod';
import { DataFormatError, describeError } from './errors';
import { AttributeMetadataSchema } from './protocol/messages';
import type { AttributeMetadata, LeafNode, TreeNode } from './types';

const LeafNodeSchema = z.object({
  kind: z.literal('leaf'),
  classLabel: z.string(),
  classIndex: z.number().int(),
  classDistribution: z.array(z.number()),
});

const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    LeafNodeSchema,
    z.object({
      kind: z.literal('nominal'),
      splitAttribute: z.string(),
      attributeIndex: z.number().int(),
      children: z.array(TreeNodeSchema),
      defaultChild: TreeNodeSchema.optional(),
    }),
    z.object({
      kind: z.literal('numeric'),
      splitAttribute: z.string(),
      attributeIndex: z.number().int(),
      threshold: z.number(),
      left: TreeNodeSchema,
      right: TreeNodeSchema,
      defaultChild: TreeNodeSchema.optional(),
    }),
  ])
);

const SavedModelSchema = z.object({
  relation: z.string(),
  attributes: z.array(AttributeMetadataSchema),
  classIndex: z.number().int(),
  tree: TreeNodeSchema,
});

/** A tree plus the schema it was trained on. */
export type SavedModel = z.infer<typeof SavedModelSchema>;

function leafText(leaf: LeafNode): string {
  return `${leaf.classLabel} [${leaf.classDistribution.join(', ')}]`;
}

function renderBranches(
  node: TreeNode,
  attributes: readonly AttributeMetadata[],
  depth: number,
  lines: string[]
): void {
  if (node.kind === 'leaf') return;

  const branches: [string, TreeNode][] = [];
  if (node.kind === 'nominal') {
    const values = attributes[node.attributeIndex]?.nominalValues ?? [];
    node.children.forEach((child, i) => branches.push([`= ${values[i] ?? String(i)}`, child]));
  } else {
    branches.push([`<= ${node.threshold}`, node.left], [`> ${node.threshold}`, node.right]);
  }
  if (node.defaultChild) {
    branches.push(['= ?', node.defaultChild]);
  }

  const indent = '|   '.repeat(depth);
  for (const [label, child] of branches) {
    const line = `${indent}${node.splitAttribute} ${label}`;
    if (child.kind === 'leaf') {
      lines.push(`${line}: ${leafText(child)}`);
    } else {
      lines.push(line);
      renderBranches(child, attributes, depth + 1, lines);
    }
  }
}

/**
 * One line per branch, nested levels prefixed with `|   `. Pass the schema
 * to print nominal value names instead of indices.
 */
export function renderTree(tree: TreeNode, attributes: readonly AttributeMetadata[] = []): string {
  if (tree.kind === 'leaf') {
    return leafText(tree);
  }
  const lines: string[] = [];
  renderBranches(tree, attributes, 0, lines);
  return lines.join('\n');
}

export function saveModel(filePath: string, model: SavedModel): void {
  fs.writeFileSync(filePath, JSON.stringify(model, null, 2));
  console.log(`Tree written to ${filePath}`);
}

export function loadModel(filePath: string): SavedModel {
  if (!fs.existsSync(filePath)) {
    throw new DataFormatError(`Tree file not found: ${filePath}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DataFormatError(`Tree file ${filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  const result = SavedModelSchema.safeParse(json);
  if (!result.success) {
    throw new DataFormatError(`Tree file ${filePath} does not hold a saved tree: ${result.error.issues[0]?.message}`);
  }
  return result.data;
}
