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

import type { Express, Request, Response } from 'express';
import {
  COORDINATOR_ID,
  ConnectionRegistry,
  DataFormatError,
  DistributedTreeBuilder,
  NodeLifecycle,
  ProtocolSequenceError,
  ProtocolStateError,
  RegistrationRequestSchema,
  SchemaMismatchError,
  SecureInformationGain,
  SecureSum,
  ackMessage,
  describeError,
  distributeAttributes,
  errorMessage,
  formatPartitioning,
  formatRunConfiguration,
  initiationMessage,
  parseMessage,
  parseRunConfiguration,
  renderTree,
  resolvePrimaryOwners,
  toErrorPayload,
  type AttributeMetadata,
  type BuildResult,
  type ClassPlacement,
  type CountRoundMessage,
  type IndexedAttribute,
  type Message,
  type MessageTransport,
  type NodeState,
  type NodeStatus,
  type PartyAttributes,
  type ProtocolNode,
  type RunConfiguration,
  type TreeSchema,
} from '../../shared/src';
import { RemoteStatistics, expectAck } from './remoteStatistics';
import type { PartyInfo, RoundCounters, RunProgress } from './types';

export interface CoordinatorOptions {
  transport: MessageTransport;
  nodeId?: string;
  datasetName: string;
  /** Which global attribute indices each party holds. */
  partitioning?: PartyAttributes[];
  /**
   * Without an explicit partitioning, this many attributes are spread over
   * the registered parties in registration order.
   */
  attributeCount?: number;
  classPlacement?: ClassPlacement;
  configuration?: Partial<RunConfiguration>;
  /** Start a run as soon as this many parties have registered. */
  expectedParties?: number;
  onResult?: (result: BuildResult) => void;
}

interface InitiationAck {
  partyId: string;
  rowCount: number;
  attributes: IndexedAttribute[];
}

function sameMetadata(a: AttributeMetadata, b: AttributeMetadata): boolean {
  return (
    a.name === b.name &&
    a.kind === b.kind &&
    a.nominalValues.length === b.nominalValues.length &&
    a.nominalValues.every((value, i) => value === b.nominalValues[i])
  );
}

function emptyCounters(): RoundCounters {
  return { started: 0, completed: 0, failed: 0 };
}

/**
 * The coordinator: collects party registrations, opens a connection to each
 * party, announces the run, then grows the tree by driving secure-sum
 * rounds through the ring. It never holds a data row.
 */
export class CoordinatorNode implements ProtocolNode {
  readonly nodeId: string;
  private readonly lifecycle: NodeLifecycle;
  private readonly registry = new ConnectionRegistry();
  private readonly parties: Map<string, PartyInfo> = new Map();
  private address: string | null = null;
  private statistics: RemoteStatistics | null = null;
  private rounds: RoundCounters = emptyCounters();
  private splits = 0;
  private result: BuildResult | null = null;
  private schema: TreeSchema | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: CoordinatorOptions) {
    this.nodeId = options.nodeId ?? COORDINATOR_ID;
    this.lifecycle = new NodeLifecycle(this.nodeId);
  }

  get state(): NodeState {
    return this.lifecycle.state;
  }

  get tree(): BuildResult | null {
    return this.result;
  }

  get trainedSchema(): TreeSchema | null {
    return this.schema;
  }

  status(): NodeStatus {
    return { nodeId: this.nodeId, role: 'coordinator', state: this.lifecycle.state };
  }

  progress(): RunProgress {
    return {
      state: this.lifecycle.state,
      datasetName: this.options.datasetName,
      parties: {
        registered: this.parties.size,
        expected: this.options.expectedParties ?? null,
      },
      rounds: { ...this.rounds },
      splits: this.splits,
      report: this.result?.report ?? null,
      error: this.lastError,
    };
  }

  listParties(): PartyInfo[] {
    return [...this.parties.values()];
  }

  async start(): Promise<string> {
    this.address = await this.options.transport.listen(this);
    this.lifecycle.transition('LISTENING');
    const expected = this.options.expectedParties;
    console.log(`Coordinator ${this.nodeId} ready at ${this.address}`);
    if (expected !== undefined) {
      console.log(`Waiting for ${expected} parties to register...`);
    }
    return this.address;
  }

  async stop(): Promise<void> {
    if (this.lifecycle.is('STOPPED')) return;
    this.registry.closeAll();
    await this.options.transport.close();
    this.statistics = null;
    this.lifecycle.transition('STOPPED');
    console.log(`Coordinator ${this.nodeId} stopped`);
  }

  private get running(): boolean {
    return this.lifecycle.is('CONNECTING', 'CONNECTED_TO_ALL_PARTIES', 'ROUND_ACTIVE');
  }

  registerParty(partyId: string, url: string): void {
    if (this.running) {
      throw new ProtocolSequenceError(`Cannot register ${partyId} while a run is in progress`);
    }
    if (this.lifecycle.is('CREATED', 'STOPPED')) {
      throw new ProtocolStateError(`Coordinator is ${this.lifecycle.state}; parties can register only while it listens`);
    }
    this.parties.set(partyId, { partyId, url, status: 'registered', lastUpdate: new Date() });

    const expected = this.options.expectedParties;
    console.log(`Party ${partyId} registered at ${url}. Total parties: ${this.parties.size}/${expected ?? '?'}`);

    // Once every expected party is in, start building
    if (expected !== undefined && this.parties.size === expected) {
      console.log('Required number of parties reached. Starting distributed tree construction...');
      void this.run().then(
        result => this.handOver(result),
        error => console.error('Distributed tree construction failed:', describeError(error))
      );
    }
  }

  private handOver(result: BuildResult): void {
    try {
      this.options.onResult?.(result);
    } catch (error) {
      console.error('Could not hand over the finished tree:', describeError(error));
    }
  }

  removeParty(partyId: string): boolean {
    if (this.running) {
      throw new ProtocolSequenceError(`Cannot remove ${partyId} while a run is in progress`);
    }
    this.registry.remove(partyId);
    return this.parties.delete(partyId);
  }

  /** Connects to every party, announces the run and builds the tree. */
  async run(): Promise<BuildResult> {
    if (this.running) {
      throw new ProtocolSequenceError('A run is already in progress');
    }
    const address = this.address;
    if (!address) {
      throw new ProtocolStateError('Coordinator must be listening before it can run');
    }
    const configuration = parseRunConfiguration(formatRunConfiguration(this.options.configuration ?? {}));
    const partitioning = this.resolvePartitioning();
    const participating = partitioning.map(p => p.partyId);
    const gain = new SecureInformationGain(
      new SecureSum(this.nodeId, participating.length + 1, {
        maskBits: configuration.maskBits,
        allowTwoParty: configuration.allowTwoPartySum,
      })
    );

    this.rounds = emptyCounters();
    this.splits = 0;
    this.result = null;
    this.lastError = null;

    await this.connectToParties(participating);

    try {
      const schema = await this.initiate(address, participating, partitioning, configuration);
      this.lifecycle.transition('ROUND_ACTIVE');

      const statistics = new RemoteStatistics(
        {
          coordinatorId: this.nodeId,
          parties: participating,
          registry: this.registry,
          gain,
          schema,
          primaryOwners: resolvePrimaryOwners(partitioning, participating),
        },
        this.rounds
      );
      this.statistics = statistics;

      const result = await new DistributedTreeBuilder(statistics, schema, configuration).build();
      await statistics.complete();

      this.splits = result.report.nodes - result.report.leaves;
      this.result = result;
      this.schema = schema;
      this.lifecycle.transition('TREE_COMPLETE');
      console.log(
        `Tree complete: ${result.report.nodes} nodes, ${result.report.leaves} leaves, ` +
          `depth ${result.report.maxDepthReached}, ${this.rounds.completed} secure-sum rounds`
      );
      console.log(renderTree(result.tree, schema.attributes));
      return result;
    } catch (error) {
      this.fail(error);
      throw error;
    } finally {
      this.statistics = null;
    }
  }

  /** Opens one connection per party; any party still unreachable after the retries fails the run. */
  async connectToParties(partyIds: readonly string[] = [...this.parties.keys()]): Promise<void> {
    this.lifecycle.transition('CONNECTING');
    for (const partyId of partyIds) {
      const party = this.parties.get(partyId);
      if (!party) {
        this.fail(new ProtocolStateError(`${partyId} never registered`));
        throw new ProtocolStateError(`${partyId} never registered`);
      }
      try {
        this.registry.add(await this.options.transport.connect(partyId, party.url));
      } catch (error) {
        this.parties.set(partyId, { ...party, status: 'unreachable', lastUpdate: new Date() });
        this.fail(error);
        throw error;
      }
      this.parties.set(partyId, { ...party, status: 'connected', lastUpdate: new Date() });
    }
    this.lifecycle.transition('CONNECTED_TO_ALL_PARTIES');
    console.log(`Connected to all ${partyIds.length} parties`);
  }

  async handleMessage(body: unknown): Promise<Message> {
    let message: Message | null = null;
    try {
      message = parseMessage(body);
      if (message.destinationId !== this.nodeId) {
        throw new ProtocolSequenceError(`Message for ${message.destinationId} delivered to ${this.nodeId}`);
      }
      if (message.type !== 'CountRound') {
        throw new ProtocolSequenceError(`Coordinator does not accept ${message.type} requests`);
      }
      return this.acceptReturn(message);
    } catch (error) {
      console.warn(`[${this.nodeId}] Rejecting ${message?.type ?? 'message'}: ${describeError(error)}`);
      const roundId = message?.type === 'CountRound' ? message.payload.roundId : undefined;
      return errorMessage(this.nodeId, message?.sourceId ?? 'unknown', toErrorPayload(error, roundId));
    }
  }

  mountRoutes(app: Express): void {
    // Register a data party
    app.post('/register', (req: Request, res: Response) => {
      const parsed = RegistrationRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid registration', message: parsed.error.issues[0]?.message });
      }
      if (this.running) {
        return res.status(409).json({ error: 'Run in progress', message: 'Registration is closed until the run ends' });
      }
      try {
        this.registerParty(parsed.data.partyId, parsed.data.url);
      } catch (error) {
        return res.status(400).json({ error: 'Registration refused', message: describeError(error) });
      }
      return res.json({ partyId: parsed.data.partyId, registeredParties: [...this.parties.keys()] });
    });

    // Get construction progress
    app.get('/progress', (req: Request, res: Response) => {
      res.json(this.progress());
    });

    // Get the finished tree
    app.get('/tree', (req: Request, res: Response) => {
      if (!this.result || !this.schema) {
        return res.status(404).json({ error: 'No tree available', message: 'No run has completed yet' });
      }
      return res.json({
        tree: this.result.tree,
        report: this.result.report,
        attributes: this.schema.attributes,
        classIndex: this.schema.classIndex,
      });
    });

    // List registered parties
    app.get('/parties', (req: Request, res: Response) => {
      res.json(this.listParties());
    });

    // Drop a registered party
    app.delete('/parties/:partyId', (req: Request, res: Response) => {
      const { partyId } = req.params;
      try {
        if (!this.removeParty(partyId)) {
          return res.status(404).json({ error: 'Party not found' });
        }
      } catch (error) {
        return res.status(409).json({ error: 'Run in progress', message: describeError(error) });
      }
      console.log(`Party ${partyId} removed by admin`);
      return res.json({ message: 'Party removed' });
    });
  }

  private acceptReturn(message: CountRoundMessage): Message {
    if (!this.statistics || !this.lifecycle.is('ROUND_ACTIVE')) {
      throw new ProtocolSequenceError(`No run is active (state ${this.lifecycle.state})`);
    }
    this.statistics.acceptReturn(message);
    return ackMessage(this.nodeId, message.sourceId, {
      acknowledgedType: 'CountRound',
      roundId: message.payload.roundId,
    });
  }

  private resolvePartitioning(): PartyAttributes[] {
    const registered = [...this.parties.keys()];
    if (registered.length === 0) {
      throw new ProtocolStateError('No parties have registered');
    }

    const explicit = this.options.partitioning;
    if (!explicit) {
      const { attributeCount } = this.options;
      if (attributeCount === undefined) {
        throw new DataFormatError('Either an attribute partitioning or an attribute count is required');
      }
      const classIndex = this.options.configuration?.classIndex ?? attributeCount - 1;
      return distributeAttributes(attributeCount, classIndex, registered.length, this.options.classPlacement).map(
        (attributeIndices, i) => ({ partyId: registered[i], attributeIndices })
      );
    }

    for (const { partyId } of explicit) {
      if (!this.parties.has(partyId)) {
        throw new DataFormatError(`The attribute partitioning names ${partyId}, which has not registered`);
      }
    }
    const unassigned = registered.filter(partyId => !explicit.some(p => p.partyId === partyId));
    if (unassigned.length > 0) {
      throw new DataFormatError(`Registered parties hold no attributes: ${unassigned.join(', ')}`);
    }
    return explicit;
  }

  private async initiate(
    address: string,
    participating: readonly string[],
    partitioning: readonly PartyAttributes[],
    configuration: RunConfiguration
  ): Promise<TreeSchema> {
    const endpoints: Record<string, string> = { [this.nodeId]: address };
    participating.forEach(partyId => {
      endpoints[partyId] = this.parties.get(partyId)?.url ?? '';
    });
    const payload = {
      coordinatorId: this.nodeId,
      participatingNodes: [...participating],
      datasetName: this.options.datasetName,
      attributePartitioning: formatPartitioning(partitioning),
      configuration: formatRunConfiguration(configuration),
      endpoints,
    };

    console.log(`Announcing run on ${this.options.datasetName} to ${participating.length} parties`);
    const acks = await Promise.all(
      participating.map(async (partyId): Promise<InitiationAck> => {
        const reply = await this.registry.get(partyId).send(initiationMessage(this.nodeId, partyId, payload));
        const ack = expectAck(reply);
        if (ack.acknowledgedType !== 'Initiation') {
          throw new ProtocolSequenceError(`${partyId} acknowledged the Initiation with a ${ack.acknowledgedType} Ack`);
        }
        return { partyId, rowCount: ack.rowCount, attributes: ack.attributes };
      })
    );

    for (const ack of acks) {
      const party = this.parties.get(ack.partyId);
      if (party) {
        this.parties.set(ack.partyId, {
          ...party,
          status: 'initiated',
          lastUpdate: new Date(),
          rowCount: ack.rowCount,
          attributeIndices: ack.attributes.map(a => a.index),
        });
      }
    }
    return this.assembleSchema(acks, configuration.classIndex);
  }

  /** Joins the parties' column descriptions into one schema and checks the rows line up. */
  private assembleSchema(acks: readonly InitiationAck[], configuredClassIndex: number | undefined): TreeSchema {
    const rowCounts = new Set(acks.map(ack => ack.rowCount));
    if (rowCounts.size > 1) {
      const detail = acks.map(ack => `${ack.partyId}=${ack.rowCount}`).join(', ');
      throw new SchemaMismatchError(`Parties hold different row counts: ${detail}`);
    }

    const byIndex = new Map<number, AttributeMetadata>();
    for (const ack of acks) {
      for (const { index, metadata } of ack.attributes) {
        const known = byIndex.get(index);
        if (known && !sameMetadata(known, metadata)) {
          throw new SchemaMismatchError(`Parties disagree on the definition of attribute ${index}`);
        }
        byIndex.set(index, metadata);
      }
    }

    const attributes: AttributeMetadata[] = [];
    const count = Math.max(...byIndex.keys()) + 1;
    for (let i = 0; i < count; i++) {
      const metadata = byIndex.get(i);
      if (!metadata) {
        throw new SchemaMismatchError(`Attribute ${i} is held by no party`);
      }
      attributes.push(metadata);
    }

    const classIndex = configuredClassIndex ?? count - 1;
    if (attributes[classIndex]?.kind !== 'nominal') {
      throw new SchemaMismatchError(`Class attribute ${classIndex} must be a nominal attribute held by some party`);
    }
    return { attributes, classIndex };
  }

  private fail(error: unknown): void {
    this.lastError = describeError(error);
    if (this.lifecycle.canTransition('FAILED')) {
      this.lifecycle.transition('FAILED');
    }
  }
}
