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
  ProtocolStateError,
  SchemaMismatchError,
  childBranchId,
  countRoundMessage,
  decodeShares,
  encodeShares,
  errorFromPayload,
  numValues,
  splitDecisionMessage,
  unflattenCounts,
  type AckPayload,
  type ConnectionRegistry,
  type CountMatrix,
  type CountQuery,
  type CountRoundMessage,
  type Message,
  type SecureInformationGain,
  type SecureSumShare,
  type SplitDecisionPayload,
  type SplitStatistics,
  type TreeSchema,
} from '../../shared/src';
import type { RoundCounters } from './types';

export interface RingContext {
  coordinatorId: string;
  /** Ring order after the coordinator; the last party hands shares back. */
  parties: readonly string[];
  registry: ConnectionRegistry;
  gain: SecureInformationGain;
  schema: TreeSchema;
  primaryOwners: ReadonlyMap<number, string>;
}

interface PendingRound {
  expectedFrom: string;
  width: number;
  returned: SecureSumShare[] | null;
}

/** Unwraps a reply, rebuilding a peer's Error as the matching local error. */
export function expectAck(reply: Message): AckPayload {
  if (reply.type === 'Error') {
    throw errorFromPayload(reply.payload, reply.sourceId);
  }
  if (reply.type !== 'Ack') {
    throw new ProtocolSequenceError(`${reply.sourceId} replied with ${reply.type} instead of Ack`);
  }
  return reply.payload;
}

/**
 * Counts gathered through the party ring. Each query is one secure-sum
 * pass: the coordinator starts it with zeros, every party adds its share
 * in ring order, and the last party hands it back for unmasking.
 */
export class RemoteStatistics implements SplitStatistics {
  private readonly pending = new Map<string, PendingRound>();
  private roundSequence = 0;

  constructor(
    private readonly ring: RingContext,
    private readonly counters: RoundCounters
  ) {
    if (ring.parties.length === 0) {
      throw new ProtocolStateError('The ring has no data parties');
    }
  }

  async classDistribution(branchId: string): Promise<number[]> {
    const { attributes, classIndex } = this.ring.schema;
    return this.runRound(branchId, { kind: 'class' }, numValues(attributes[classIndex]));
  }

  async attributeCounts(branchId: string, attributeIndex: number): Promise<CountMatrix> {
    const { attributes, classIndex } = this.ring.schema;
    const attribute = attributes[attributeIndex];
    if (!attribute || attribute.kind !== 'nominal') {
      throw new SchemaMismatchError(`Attribute ${attributeIndex} is not a nominal attribute of the schema`);
    }
    if (!this.ring.primaryOwners.has(attributeIndex)) {
      throw new SchemaMismatchError(`No party holds attribute ${attributeIndex}`);
    }
    const numAttributeValues = numValues(attribute);
    const numClassValues = numValues(attributes[classIndex]);
    const flat = await this.runRound(
      branchId,
      { kind: 'attribute', attributeIndex },
      numAttributeValues * numClassValues
    );
    return unflattenCounts(flat, numAttributeValues, numClassValues);
  }

  /**
   * The attribute's owner routes the rows and reports where each went;
   * every other party then follows the same assignments.
   */
  async split(branchId: string, attributeIndex: number): Promise<string[]> {
    const owner = this.ring.primaryOwners.get(attributeIndex);
    if (!owner) {
      throw new ProtocolStateError(`Cannot split on attribute ${attributeIndex}: no party holds it`);
    }
    const childBranchIds = Array.from({ length: numValues(this.ring.schema.attributes[attributeIndex]) }, (_, i) =>
      childBranchId(branchId, i)
    );
    const decision = { decision: 'split', branchId, attributeIndex, childBranchIds } as const;

    const ack = expectAck(await this.send(owner, decision));
    if (ack.acknowledgedType !== 'SplitDecision' || !ack.assignments) {
      throw new ProtocolSequenceError(`${owner} acknowledged the split of ${branchId} without row assignments`);
    }
    const assignments = ack.assignments;
    if (assignments.children.length !== childBranchIds.length) {
      throw new ProtocolSequenceError(
        `${owner} routed ${branchId} into ${assignments.children.length} children, expected ${childBranchIds.length}`
      );
    }

    await Promise.all(
      this.ring.parties
        .filter(partyId => partyId !== owner)
        .map(async partyId => expectAck(await this.send(partyId, { ...decision, assignments })))
    );
    return childBranchIds;
  }

  async retire(branchId: string): Promise<void> {
    await this.broadcast({ decision: 'leaf', branchId });
  }

  async complete(): Promise<void> {
    await this.broadcast({ decision: 'complete' });
  }

  /** Takes a share coming back from the last party; throws if it does not close a pending round. */
  acceptReturn(message: CountRoundMessage): void {
    const { roundId, share } = message.payload;
    const slot = this.pending.get(roundId);
    if (!slot) {
      throw new ProtocolSequenceError(`No round ${roundId} is waiting for its share`);
    }
    if (message.sourceId !== slot.expectedFrom) {
      throw new ProtocolSequenceError(`Round ${roundId} came back from ${message.sourceId}, expected ${slot.expectedFrom}`);
    }
    if (share.initiatorId !== this.ring.coordinatorId) {
      throw new ProtocolSequenceError(`Round ${roundId} carries a share started by ${share.initiatorId}`);
    }
    if (share.round !== this.ring.gain.ringSize) {
      throw new ProtocolSequenceError(
        `Round ${roundId} came back after ${share.round} of ${this.ring.gain.ringSize} ring members`
      );
    }
    if (share.partialSums.length !== slot.width) {
      throw new ProtocolSequenceError(`Round ${roundId} came back with ${share.partialSums.length} sums, sent ${slot.width}`);
    }
    if (slot.returned) {
      throw new ProtocolSequenceError(`Round ${roundId} already came back`);
    }
    slot.returned = decodeShares(share);
  }

  private async runRound(branchId: string, query: CountQuery, width: number): Promise<number[]> {
    const { coordinatorId, parties, gain } = this.ring;
    const label = query.kind === 'class' ? 'class' : `attr${query.attributeIndex}`;
    const roundId = `${branchId}/${label}/${++this.roundSequence}`;
    const first = parties[0];

    const pending = gain.initiateZeroCounts(width);
    const slot: PendingRound = { expectedFrom: parties[parties.length - 1], width, returned: null };
    this.pending.set(roundId, slot);
    this.counters.started++;

    try {
      const share = encodeShares(gain.outgoingShares(pending));
      const reply = await this.ring.registry
        .get(first)
        .send(countRoundMessage(coordinatorId, first, { roundId, branchId, query, width, share }));
      const ack = expectAck(reply);
      if (ack.acknowledgedType !== 'CountRound' || ack.roundId !== roundId) {
        throw new ProtocolSequenceError(`${first} acknowledged round ${roundId} with a ${ack.acknowledgedType} Ack`);
      }
      if (!slot.returned) {
        throw new ProtocolSequenceError(`Round ${roundId} finished without its share coming back`);
      }
      const sums = gain.finalizeCounts(pending, slot.returned);
      this.counters.completed++;
      return sums;
    } catch (error) {
      this.counters.failed++;
      throw error;
    } finally {
      this.pending.delete(roundId);
    }
  }

  private send(partyId: string, decision: SplitDecisionPayload): Promise<Message> {
    return this.ring.registry
      .get(partyId)
      .send(splitDecisionMessage(this.ring.coordinatorId, partyId, decision));
  }

  private async broadcast(decision: SplitDecisionPayload): Promise<void> {
    await Promise.all(this.ring.parties.map(async partyId => expectAck(await this.send(partyId, decision))));
  }
}
