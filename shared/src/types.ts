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

export type AttributeKind = 'numeric' | 'nominal';

export interface AttributeMetadata {
  name: string;
  kind: AttributeKind;
  nominalValues: readonly string[];
}

export interface IndexedAttribute {
  index: number;
  metadata: AttributeMetadata;
}

/**
 * One party's vertical slice of a dataset. `attributeIndices[k]` is the global
 * index of local column `k`; rows are row-aligned with every other party.
 */
export interface DataPartition {
  attributeIndices: number[];
  rows: number[][];
}

export interface Dataset {
  relation: string;
  attributes: AttributeMetadata[];
  rows: number[][];
  classIndex: number;
}

export interface LeafNode {
  kind: 'leaf';
  classLabel: string;
  classIndex: number;
  classDistribution: number[];
}

export interface NominalSplitNode {
  kind: 'nominal';
  splitAttribute: string;
  attributeIndex: number;
  children: TreeNode[];
  defaultChild?: TreeNode;
}

export interface NumericSplitNode {
  kind: 'numeric';
  splitAttribute: string;
  attributeIndex: number;
  threshold: number;
  left: TreeNode;
  right: TreeNode;
  defaultChild?: TreeNode;
}

export type InternalNode = NominalSplitNode | NumericSplitNode;

export type TreeNode = LeafNode | InternalNode;

export interface TreeConfig {
  maxDepth: number;
  minInstances: number;
  minGainThreshold: number;
}

export interface BranchAssignments {
  children: number[][];
  unrouted: number[];
}

export interface BuildReport {
  nodes: number;
  leaves: number;
  maxDepthReached: number;
  abortedBranches: string[];
  excludedCandidates: { branchId: string; attributeIndex: number; reason: string }[];
}

export interface BuildResult {
  tree: TreeNode;
  report: BuildReport;
}

export function numValues(attribute: AttributeMetadata): number {
  return attribute.kind === 'nominal' ? attribute.nominalValues.length : 0;
}
