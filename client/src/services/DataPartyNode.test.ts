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
  InProcessNetwork,
  ProtocolSequenceError,
  SecureSum,
  ackMessage,
  countRoundMessage,
  decodeShares,
  encodeShares,
  initiationMessage,
  parseMessage,
  splitDecisionMessage,
  type BranchAssignments,
  type Dataset,
  type InitiationPayload,
  type Message,
  type NodeStatus,
  type ProtocolNode,
  type SplitDecisionPayload,
  type WireShare,
} from '../../../shared/src';
import { DataPartyNode } from './DataPartyNode';

const toy: Dataset = {
  relation: 'toy',
  attributes: [
    { name: 'A', kind: 'nominal', nominalValues: ['a0', 'a1'] },
    { name: 'B', kind: 'nominal', nominalValues: ['p', 'q'] },
    { name: 'class', kind: 'nominal', nominalValues: ['no', 'yes'] },
  ],
  rows: [
    [0, 0, 0],
    [0, 0, 1],
    [0, 1, 1],
    [1, 1, 1],
  ],
  classIndex: 2,
};

/** Stands in for the coordinator at the end of the ring and keeps every returned share. */
class ReturnCollector implements ProtocolNode {
  readonly nodeId = 'coordinator';
  readonly returned: WireShare[] = [];

  status(): NodeStatus {
    return { nodeId: this.nodeId, role: 'coordinator', state: 'ROUND_ACTIVE' };
  }

  async handleMessage(body: unknown): Promise<Message> {
    const message = parseMessage(body);
    if (message.type !== 'CountRound') {
      throw new ProtocolSequenceError(`Unexpected ${message.type}`);
    }
    this.returned.push(message.payload.share);
    return ackMessage(this.nodeId, message.sourceId, { acknowledgedType: 'CountRound', roundId: message.payload.roundId });
  }
}

function errorCode(reply: Message): string | undefined {
  return reply.type === 'Error' ? reply.payload.code : undefined;
}

describe('DataPartyNode', () => {
  let network: InProcessNetwork;
  let collector: ReturnCollector;
  let party1: DataPartyNode;
  let party2: DataPartyNode;
  let initiation: InitiationPayload;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    network = new InProcessNetwork();
    collector = new ReturnCollector();
    const retry = { attempts: 1, delayMs: 0 };
    party1 = new DataPartyNode({ nodeId: 'party1', transport: network.transport(retry), dataset: toy });
    party2 = new DataPartyNode({ nodeId: 'party2', transport: network.transport(retry), dataset: toy });
    initiation = {
      coordinatorId: 'coordinator',
      participatingNodes: ['party1', 'party2'],
      datasetName: 'toy',
      attributePartitioning: ['0:party1', '1,2:party2'],
      configuration: {},
      endpoints: {
        coordinator: network.attach(collector),
        party1: await party1.start(),
        party2: await party2.start(),
      },
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function join(): Promise<void> {
    for (const party of [party1, party2]) {
      const reply = await party.handleMessage(initiationMessage('coordinator', party.nodeId, initiation));
      expect(reply.type).toBe('Ack');
    }
  }

  it('acknowledges an Initiation with its rows and columns', async () => {
    const reply = await party2.handleMessage(initiationMessage('coordinator', 'party2', initiation));
    expect(reply).toEqual(
      ackMessage('party2', 'coordinator', {
        acknowledgedType: 'Initiation',
        rowCount: 4,
        attributes: [
          { index: 1, metadata: toy.attributes[1] },
          { index: 2, metadata: toy.attributes[2] },
        ],
      })
    );
    expect(party2.state).toBe('ROUND_ACTIVE');
  });

  it('adds its counts and passes the share on around the ring', async () => {
    await join();
    const sum = new SecureSum('coordinator', 3);
    const states = sum.initiateVector([], 2);
    const reply = await party1.handleMessage(
      countRoundMessage('coordinator', 'party1', {
        roundId: 'root/class/1',
        branchId: 'root',
        query: { kind: 'class' },
        width: 2,
        share: encodeShares(states.map(state => sum.toShare(state))),
      })
    );

    expect(reply).toEqual(ackMessage('party1', 'coordinator', { acknowledgedType: 'CountRound', roundId: 'root/class/1' }));
    expect(collector.returned).toHaveLength(1);
    const returned = decodeShares(collector.returned[0]);
    expect(sum.finalizeVector(sum.absorbVector(states, returned))).toEqual([1, 3]);
  });

  it('rejects a round from anyone but its predecessor', async () => {
    await join();
    const reply = await party2.handleMessage(
      countRoundMessage('coordinator', 'party2', {
        roundId: 'r2',
        branchId: 'root',
        query: { kind: 'class' },
        width: 1,
        share: { initiatorId: 'coordinator', partialSums: ['0'], round: 2 },
      })
    );
    expect(reply.type === 'Error' && reply.payload).toEqual({
      code: 'PROTOCOL_SEQUENCE',
      message: 'Round r2 came from coordinator, expected party1',
      roundId: 'r2',
    });
  });

  it('rejects a share at the wrong ring step', async () => {
    await join();
    const reply = await party1.handleMessage(
      countRoundMessage('coordinator', 'party1', {
        roundId: 'r3',
        branchId: 'root',
        query: { kind: 'class' },
        width: 1,
        share: { initiatorId: 'coordinator', partialSums: ['0'], round: 2 },
      })
    );
    expect(reply.type === 'Error' && reply.payload.message).toBe('Round r3 reached ring position 1 at step 2');
  });

  it('rejects rounds before it has joined a run', async () => {
    const reply = await party1.handleMessage(
      countRoundMessage('coordinator', 'party1', {
        roundId: 'r4',
        branchId: 'root',
        query: { kind: 'class' },
        width: 1,
        share: { initiatorId: 'coordinator', partialSums: ['0'], round: 1 },
      })
    );
    expect(reply.type === 'Error' && reply.payload.message).toBe('party1 has no active run (state LISTENING)');
  });

  it('rejects messages addressed to another node', async () => {
    const reply = await party1.handleMessage(splitDecisionMessage('coordinator', 'party2', { decision: 'complete' }));
    expect(errorCode(reply)).toBe('PROTOCOL_SEQUENCE');
  });

  it('rejects an Initiation that leaves it out', async () => {
    const reply = await party1.handleMessage(
      initiationMessage('coordinator', 'party1', { ...initiation, participatingNodes: ['party2', 'party3'] })
    );
    expect(errorCode(reply)).toBe('PROTOCOL_SEQUENCE');
  });

  it('applies splits, leaves and the end of the run', async () => {
    await join();
    const splitOnB = (assignments?: BranchAssignments): SplitDecisionPayload => ({
      decision: 'split',
      branchId: 'root',
      attributeIndex: 1,
      childBranchIds: ['root.0', 'root.1'],
      assignments,
    });

    const ownerReply = await party2.handleMessage(splitDecisionMessage('coordinator', 'party2', splitOnB()));
    const assignments: BranchAssignments = { children: [[0, 1], [2, 3]], unrouted: [] };
    expect(ownerReply).toEqual(
      ackMessage('party2', 'coordinator', { acknowledgedType: 'SplitDecision', branchId: 'root', assignments })
    );

    const followerReply = await party1.handleMessage(splitDecisionMessage('coordinator', 'party1', splitOnB(assignments)));
    expect(followerReply.type).toBe('Ack');
    expect(party1.branchRows('root.1')).toEqual([2, 3]);

    await party1.handleMessage(splitDecisionMessage('coordinator', 'party1', { decision: 'leaf', branchId: 'root.0' }));
    expect(() => party1.branchRows('root.0')).toThrow(ProtocolSequenceError);

    await party1.handleMessage(splitDecisionMessage('coordinator', 'party1', { decision: 'complete' }));
    expect(party1.state).toBe('TREE_COMPLETE');
  });

  it('only takes split decisions from the coordinator', async () => {
    await join();
    const reply = await party1.handleMessage(splitDecisionMessage('party2', 'party1', { decision: 'leaf', branchId: 'root' }));
    expect(reply.type === 'Error' && reply.payload.message).toBe('Split decisions come from coordinator, not party2');
  });
});
