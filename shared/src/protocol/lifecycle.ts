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

import { ProtocolStateError } from '../errors';

export const NODE_STATES = [
  'CREATED',
  'LISTENING',
  'CONNECTING',
  'CONNECTED_TO_ALL_PARTIES',
  'ROUND_ACTIVE',
  'TREE_COMPLETE',
  'FAILED',
  'STOPPED',
] as const;

export type NodeState = (typeof NODE_STATES)[number];

const TRANSITIONS: Record<NodeState, readonly NodeState[]> = {
  CREATED: ['LISTENING', 'STOPPED'],
  LISTENING: ['CONNECTING', 'ROUND_ACTIVE', 'STOPPED'],
  CONNECTING: ['CONNECTED_TO_ALL_PARTIES', 'FAILED', 'STOPPED'],
  CONNECTED_TO_ALL_PARTIES: ['ROUND_ACTIVE', 'FAILED', 'STOPPED'],
  // A data party that receives a fresh Initiation mid-run starts over
  ROUND_ACTIVE: ['ROUND_ACTIVE', 'TREE_COMPLETE', 'FAILED', 'STOPPED'],
  TREE_COMPLETE: ['CONNECTING', 'ROUND_ACTIVE', 'STOPPED'],
  FAILED: ['CONNECTING', 'ROUND_ACTIVE', 'STOPPED'],
  STOPPED: [],
};

export class NodeLifecycle {
  private current: NodeState = 'CREATED';

  constructor(private readonly nodeId: string) {}

  get state(): NodeState {
    return this.current;
  }

  is(...states: NodeState[]): boolean {
    return states.includes(this.current);
  }

  canTransition(to: NodeState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: NodeState): void {
    if (!this.canTransition(to)) {
      throw new ProtocolStateError(`${this.nodeId}: illegal transition ${this.current} -> ${to}`);
    }
    console.log(`[${this.nodeId}] ${this.current} -> ${to}`);
    this.current = to;
  }
}
