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

import axios from 'axios';
import {
  CONNECTION_RETRY_DELAY,
  ConnectionRegistry,
  DataFormatError,
  MAX_CONNECTION_RETRIES,
  NodeLifecycle,
  ProtocolSequenceError,
  REQUEST_TIMEOUT,
  RegistrationResponseSchema,
  SchemaMismatchError,
  SecureInformationGain,
  SecureSum,
  ackMessage,
  countRoundMessage,
  createVerticalPartition,
  decodeShares,
  describeError,
  encodeShares,
  errorMessage,
  parseMessage,
  parsePartitioning,
  parseRunConfiguration,
  resolvePrimaryOwners,
  toErrorPayload,
  withRetries,
  type AttributeMetadata,
  type CountRoundMessage,
  type Dataset,
  type InitiationMessage,
  type Message,
  type MessageTransport,
  type NodeState,
  type NodeStatus,
  type ProtocolNode,
  type RetryPolicy,
  type SplitDecisionMessage,
} from '../../../shared/src';
import { LocalPartitionService } from './LocalPartitionService';

export interface DataPartyOptions {
  nodeId: string;
  transport: MessageTransport;
  /**
   * Rows in the global column layout. Only the columns the Initiation
   * assigns to this party are kept; the rest may be missing (`?`).
   */
  dataset?: Dataset;
  /** Register here once listening. Leave out when the coordinator is told about parties directly. */
  coordinatorUrl?: string;
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
}

/** What a party knows about the run it joined. */
interface PartySession {
  coordinatorId: string;
  position: number;
  predecessor: string;
  successor: string;
  gain: SecureInformationGain;
  partition: LocalPartitionService;
}

/**
 * A data party: holds one vertical slice, adds its counts to shares passing
 * through the ring, and moves its rows between branches as splits land.
 */
export class DataPartyNode implements ProtocolNode {
  readonly nodeId: string;
  private readonly lifecycle: NodeLifecycle;
  private readonly registry = new ConnectionRegistry();
  private dataset: Dataset | null;
  private address: string | null = null;
  private session: PartySession | null = null;

  constructor(private readonly options: DataPartyOptions) {
    this.nodeId = options.nodeId;
    this.lifecycle = new NodeLifecycle(options.nodeId);
    this.dataset = options.dataset ?? null;
  }

  get state(): NodeState {
    return this.lifecycle.state;
  }

  status(): NodeStatus {
    return { nodeId: this.nodeId, role: 'dataparty', state: this.lifecycle.state };
  }

  /** Rows still assigned to a branch; empty outside a run. */
  branchRows(branchId: string): readonly number[] {
    return this.session?.partition.rowsOf(branchId) ?? [];
  }

  loadDataset(dataset: Dataset): void {
    if (this.lifecycle.is('ROUND_ACTIVE')) {
      throw new ProtocolSequenceError(`${this.nodeId} cannot swap its dataset during a run`);
    }
    this.dataset = dataset;
    console.log(`[${this.nodeId}] Loaded ${dataset.rows.length} rows of ${dataset.relation}`);
  }

  async start(): Promise<string> {
    this.address = await this.options.transport.listen(this);
    this.lifecycle.transition('LISTENING');
    if (this.options.coordinatorUrl) {
      await this.register(this.options.coordinatorUrl);
    }
    return this.address;
  }

  async register(coordinatorUrl: string): Promise<void> {
    const address = this.address;
    if (!address) {
      throw new ProtocolSequenceError(`${this.nodeId} must listen before registering`);
    }
    const retry = this.options.retry ?? { attempts: MAX_CONNECTION_RETRIES, delayMs: CONNECTION_RETRY_DELAY };
    const response = await withRetries(`Registering with ${coordinatorUrl}`, retry, async () => {
      const { data } = await axios.post<unknown>(
        `${coordinatorUrl.replace(/\/+$/, '')}/register`,
        { partyId: this.nodeId, url: address },
        { timeout: this.options.requestTimeoutMs ?? REQUEST_TIMEOUT }
      );
      return RegistrationResponseSchema.parse(data);
    });
    console.log(
      `[${this.nodeId}] Registered with coordinator. Parties so far: ${response.registeredParties.join(', ')}`
    );
  }

  async stop(): Promise<void> {
    if (this.lifecycle.is('STOPPED')) return;
    this.registry.closeAll();
    await this.options.transport.close();
    this.session?.partition.clear();
    this.session = null;
    this.lifecycle.transition('STOPPED');
  }

  async handleMessage(body: unknown): Promise<Message> {
    let message: Message | null = null;
    try {
      message = parseMessage(body);
      if (message.destinationId !== this.nodeId) {
        throw new ProtocolSequenceError(`Message for ${message.destinationId} delivered to ${this.nodeId}`);
      }
      return await this.dispatch(message);
    } catch (error) {
      console.warn(`[${this.nodeId}] Rejecting ${message?.type ?? 'message'}: ${describeError(error)}`);
      const roundId = message?.type === 'CountRound' ? message.payload.roundId : undefined;
      return errorMessage(this.nodeId, message?.sourceId ?? 'unknown', toErrorPayload(error, roundId));
    }
  }

  private async dispatch(message: Message): Promise<Message> {
    switch (message.type) {
      case 'Initiation':
        return this.handleInitiation(message);
      case 'CountRound':
        return this.handleCountRound(message);
      case 'SplitDecision':
        return this.handleSplitDecision(message);
      case 'Ack':
      case 'Error':
        throw new ProtocolSequenceError(`${message.type} from ${message.sourceId} arrived as a request`);
    }
  }

  private async handleInitiation(message: InitiationMessage): Promise<Message> {
    const payload = message.payload;
    if (message.sourceId !== payload.coordinatorId) {
      throw new ProtocolSequenceError(`Initiation sent by ${message.sourceId} on behalf of ${payload.coordinatorId}`);
    }
    if (!this.lifecycle.canTransition('ROUND_ACTIVE')) {
      throw new ProtocolSequenceError(`${this.nodeId} cannot join a run while ${this.lifecycle.state}`);
    }
    const dataset = this.dataset;
    if (!dataset) {
      throw new DataFormatError(`${this.nodeId} has no dataset loaded`);
    }

    const position = payload.participatingNodes.indexOf(this.nodeId) + 1;
    if (position === 0) {
      throw new ProtocolSequenceError(`${this.nodeId} is not among the participating nodes`);
    }
    const configuration = parseRunConfiguration(payload.configuration);
    const partitioning = parsePartitioning(payload.attributePartitioning);
    const mine = partitioning.find(p => p.partyId === this.nodeId);
    if (!mine) {
      throw new SchemaMismatchError(`The attribute partitioning assigns nothing to ${this.nodeId}`);
    }

    const attributes = new Map<number, AttributeMetadata>();
    for (const index of mine.attributeIndices) {
      const metadata = dataset.attributes[index];
      if (!metadata) {
        throw new SchemaMismatchError(
          `Attribute ${index} is assigned to ${this.nodeId}, whose dataset has ${dataset.attributes.length} columns`
        );
      }
      attributes.set(index, metadata);
    }
    const classIndex =
      configuration.classIndex ?? Math.max(...partitioning.flatMap(p => p.attributeIndices));

    const ring = [payload.coordinatorId, ...payload.participatingNodes];
    const successor = ring[(position + 1) % ring.length];
    const successorUrl = payload.endpoints[successor];
    if (!successorUrl) {
      throw new ProtocolSequenceError(`Initiation gives no endpoint for ${successor}`);
    }
    const gain = new SecureInformationGain(
      new SecureSum(this.nodeId, ring.length, {
        maskBits: configuration.maskBits,
        allowTwoParty: configuration.allowTwoPartySum,
      })
    );

    this.registry.add(await this.options.transport.connect(successor, successorUrl));
    this.session?.partition.clear();
    this.session = {
      coordinatorId: payload.coordinatorId,
      position,
      predecessor: ring[position - 1],
      successor,
      gain,
      partition: new LocalPartitionService(
        this.nodeId,
        createVerticalPartition(dataset.rows, mine.attributeIndices),
        attributes,
        classIndex,
        resolvePrimaryOwners(partitioning, payload.participatingNodes)
      ),
    };
    this.lifecycle.transition('ROUND_ACTIVE');
    console.log(
      `[${this.nodeId}] Joined run on ${payload.datasetName} at ring position ${position}/${ring.length - 1}, ` +
        `holding attributes ${mine.attributeIndices.join(',')}`
    );

    return ackMessage(this.nodeId, message.sourceId, {
      acknowledgedType: 'Initiation',
      rowCount: dataset.rows.length,
      attributes: mine.attributeIndices.map(index => ({ index, metadata: dataset.attributes[index] })),
    });
  }

  private async handleCountRound(message: CountRoundMessage): Promise<Message> {
    const session = this.activeSession();
    const payload = message.payload;
    if (message.sourceId !== session.predecessor) {
      throw new ProtocolSequenceError(
        `Round ${payload.roundId} came from ${message.sourceId}, expected ${session.predecessor}`
      );
    }
    if (payload.share.round !== session.position) {
      throw new ProtocolSequenceError(
        `Round ${payload.roundId} reached ring position ${session.position} at step ${payload.share.round}`
      );
    }
    if (payload.share.partialSums.length !== payload.width) {
      throw new SchemaMismatchError(
        `Round ${payload.roundId} carries ${payload.share.partialSums.length} sums for width ${payload.width}`
      );
    }

    const local = session.partition.contribution(payload.branchId, payload.query, payload.width);
    const shares = session.gain.participateCounts(decodeShares(payload.share), local);

    const reply = await this.registry
      .get(session.successor)
      .send(countRoundMessage(this.nodeId, session.successor, { ...payload, share: encodeShares(shares) }));
    if (reply.type === 'Error') {
      console.warn(`[${this.nodeId}] ${reply.sourceId} failed round ${payload.roundId}: ${reply.payload.message}`);
      return errorMessage(this.nodeId, message.sourceId, reply.payload);
    }
    if (reply.type !== 'Ack' || reply.payload.acknowledgedType !== 'CountRound') {
      throw new ProtocolSequenceError(`${session.successor} answered round ${payload.roundId} with ${reply.type}`);
    }
    return ackMessage(this.nodeId, message.sourceId, { acknowledgedType: 'CountRound', roundId: payload.roundId });
  }

  private async handleSplitDecision(message: SplitDecisionMessage): Promise<Message> {
    const session = this.activeSession();
    if (message.sourceId !== session.coordinatorId) {
      throw new ProtocolSequenceError(`Split decisions come from ${session.coordinatorId}, not ${message.sourceId}`);
    }

    const decision = message.payload;
    switch (decision.decision) {
      case 'complete':
        session.partition.clear();
        this.lifecycle.transition('TREE_COMPLETE');
        return ackMessage(this.nodeId, message.sourceId, { acknowledgedType: 'SplitDecision' });
      case 'leaf':
        session.partition.retire(decision.branchId);
        return ackMessage(this.nodeId, message.sourceId, {
          acknowledgedType: 'SplitDecision',
          branchId: decision.branchId,
        });
      case 'split':
        if (decision.assignments) {
          session.partition.applyAssignments(decision.branchId, decision.childBranchIds, decision.assignments);
          return ackMessage(this.nodeId, message.sourceId, {
            acknowledgedType: 'SplitDecision',
            branchId: decision.branchId,
          });
        }
        return ackMessage(this.nodeId, message.sourceId, {
          acknowledgedType: 'SplitDecision',
          branchId: decision.branchId,
          assignments: session.partition.split(decision.branchId, decision.attributeIndex, decision.childBranchIds),
        });
    }
  }

  private activeSession(): PartySession {
    if (!this.session || !this.lifecycle.is('ROUND_ACTIVE')) {
      throw new ProtocolSequenceError(`${this.nodeId} has no active run (state ${this.lifecycle.state})`);
    }
    return this.session;
  }
}
