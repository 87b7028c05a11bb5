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

import { MAX_TREE_DEPTH, MIN_GAIN_THRESHOLD, MIN_INSTANCES_PER_LEAF, ROOT_BRANCH } from '../constants';
import { ProtocolSequenceError, SchemaMismatchError, describeError } from '../errors';
import { gainRatio, informationGain, type CountMatrix } from '../privacy/secureInformationGain';
import type { AttributeMetadata, BuildReport, BuildResult, TreeConfig, TreeNode } from '../types';
import { isHomogeneous, makeLeaf } from './branches';

/**
 * Where the builder gets its counts from. Every call names a branch, the
 * set of rows that reached one tree node; `ROOT_BRANCH` holds every row.
 */
export interface SplitStatistics {
  /** Global class tally over the branch's rows. */
  classDistribution(branchId: string): Promise<number[]>;
  /** Global attribute-value x class-value counts over the branch's rows. */
  attributeCounts(branchId: string, attributeIndex: number): Promise<CountMatrix>;
  /** Routes the branch's rows by the attribute; returns one child branch id per value. */
  split(branchId: string, attributeIndex: number): Promise<string[]>;
  /** The branch became a leaf and its rows are no longer needed. */
  retire(branchId: string): Promise<void>;
}

export interface TreeSchema {
  attributes: readonly AttributeMetadata[];
  classIndex: number;
}

export const DEFAULT_TREE_CONFIG: TreeConfig = {
  maxDepth: MAX_TREE_DEPTH,
  minInstances: MIN_INSTANCES_PER_LEAF,
  minGainThreshold: MIN_GAIN_THRESHOLD,
};

interface Candidate {
  attributeIndex: number;
  gainRatio: number;
}

type Decision =
  | { kind: 'leaf'; node: TreeNode }
  | { kind: 'split'; winner: Candidate; childBranchIds: string[]; distribution: number[] };

function emptyReport(): BuildReport {
  return { nodes: 0, leaves: 0, maxDepthReached: 0, abortedBranches: [], excludedCandidates: [] };
}

/**
 * Grows a tree top-down, depth first. The builder never sees rows: it asks
 * its `SplitStatistics` for class tallies and count matrices, so the same
 * code runs against a local dataset or the secure-sum ring.
 */
export class DistributedTreeBuilder {
  private report: BuildReport = emptyReport();

  constructor(
    private readonly statistics: SplitStatistics,
    private readonly schema: TreeSchema,
    private readonly config: TreeConfig = DEFAULT_TREE_CONFIG
  ) {
    const classAttribute = schema.attributes[schema.classIndex];
    if (!classAttribute || classAttribute.kind !== 'nominal') {
      throw new SchemaMismatchError(`Class index ${schema.classIndex} does not name a nominal attribute`);
    }
  }

  async build(): Promise<BuildResult> {
    this.report = emptyReport();
    const tree = await this.grow(ROOT_BRANCH, new Set<number>(), 0);
    this.countNodes(tree);
    return { tree, report: this.report };
  }

  private get classAttribute(): AttributeMetadata {
    return this.schema.attributes[this.schema.classIndex];
  }

  private async grow(branchId: string, usedAttributes: ReadonlySet<number>, depth: number): Promise<TreeNode> {
    this.report.maxDepthReached = Math.max(this.report.maxDepthReached, depth);

    const decision = await this.decide(branchId, usedAttributes, depth);
    if (decision.kind === 'leaf') {
      return decision.node;
    }

    const { winner, childBranchIds, distribution } = decision;
    const attribute = this.schema.attributes[winner.attributeIndex];
    console.log(
      `Branch ${branchId}: split on ${attribute.name} (gain ratio ${winner.gainRatio.toFixed(4)}) at depth ${depth}`
    );

    const extended = new Set(usedAttributes).add(winner.attributeIndex);
    const children: TreeNode[] = [];
    for (const childId of childBranchIds) {
      children.push(await this.grow(childId, extended, depth + 1));
    }

    return {
      kind: 'nominal',
      splitAttribute: attribute.name,
      attributeIndex: winner.attributeIndex,
      children,
      defaultChild: makeLeaf(this.classAttribute, distribution),
    };
  }

  private async decide(branchId: string, usedAttributes: ReadonlySet<number>, depth: number): Promise<Decision> {
    let distribution: number[] = [];
    try {
      distribution = await this.statistics.classDistribution(branchId);
      if (this.shouldStop(distribution, usedAttributes, depth)) {
        return { kind: 'leaf', node: await this.leaf(branchId, distribution) };
      }

      const winner = await this.findBestSplit(branchId, usedAttributes);
      if (!winner || winner.gainRatio < this.config.minGainThreshold) {
        return { kind: 'leaf', node: await this.leaf(branchId, distribution) };
      }
      const childBranchIds = await this.statistics.split(branchId, winner.attributeIndex);
      return { kind: 'split', winner, childBranchIds, distribution };
    } catch (error) {
      if (error instanceof ProtocolSequenceError) {
        console.warn(`Aborting branch ${branchId}: ${error.message}`);
        this.report.abortedBranches.push(branchId);
        return { kind: 'leaf', node: makeLeaf(this.classAttribute, distribution) };
      }
      throw error;
    }
  }

  private shouldStop(distribution: readonly number[], usedAttributes: ReadonlySet<number>, depth: number): boolean {
    const rowCount = distribution.reduce((sum, n) => sum + n, 0);
    return (
      depth >= this.config.maxDepth ||
      rowCount < this.config.minInstances ||
      isHomogeneous(distribution) ||
      usedAttributes.size >= this.schema.attributes.length - 1
    );
  }

  private async leaf(branchId: string, distribution: readonly number[]): Promise<TreeNode> {
    await this.statistics.retire(branchId);
    return makeLeaf(this.classAttribute, distribution);
  }

  /** Evaluates every candidate at once; the first highest gain ratio in index order wins. */
  private async findBestSplit(branchId: string, usedAttributes: ReadonlySet<number>): Promise<Candidate | null> {
    const candidates = this.schema.attributes
      .map((attribute, index) => ({ attribute, index }))
      .filter(
        ({ attribute, index }) =>
          index !== this.schema.classIndex && !usedAttributes.has(index) && attribute.kind === 'nominal'
      )
      .map(({ index }) => index);

    const evaluated = await Promise.all(candidates.map(index => this.evaluate(branchId, index)));

    let best: Candidate | null = null;
    for (const candidate of evaluated) {
      if (candidate && (!best || candidate.gainRatio > best.gainRatio)) {
        best = candidate;
      }
    }
    return best;
  }

  private async evaluate(branchId: string, attributeIndex: number): Promise<Candidate | null> {
    try {
      const counts = await this.statistics.attributeCounts(branchId, attributeIndex);
      const total = counts.reduce((sum, row) => sum + row.reduce((s, n) => s + n, 0), 0);
      const gain = informationGain(counts, total);
      return { attributeIndex, gainRatio: gainRatio(gain, counts, total) };
    } catch (error) {
      if (error instanceof SchemaMismatchError) {
        const reason = describeError(error);
        console.warn(`Branch ${branchId}: excluding attribute ${attributeIndex}: ${reason}`);
        this.report.excludedCandidates.push({ branchId, attributeIndex, reason });
        return null;
      }
      throw error;
    }
  }

  private countNodes(node: TreeNode): void {
    this.report.nodes++;
    if (node.kind === 'leaf') {
      this.report.leaves++;
      return;
    }
    const children = node.kind === 'nominal' ? node.children : [node.left, node.right];
    children.forEach(child => this.countNodes(child));
    if (node.defaultChild) this.countNodes(node.defaultChild);
  }
}
