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

import { DataPartyNode } from '../../client/src/services/DataPartyNode';
import { CoordinatorNode } from '../../server/src/coordinator';
import {
  DEFAULT_COORDINATOR_PORT,
  HttpTransport,
  InProcessNetwork,
  ProtocolStateError,
  distributeAttributes,
  describeError,
  type BuildResult,
  type ClassPlacement,
  type Dataset,
  type MessageTransport,
  type PartyAttributes,
  type RetryPolicy,
  type RunConfiguration,
  type TreeSchema,
} from '../../shared/src';

export type TransportKind = 'memory' | 'http';

export interface SimulationOptions {
  parties: number;
  transport?: TransportKind;
  /** Coordinator port for HTTP runs; parties take the ports after it. */
  basePort?: number;
  classPlacement?: ClassPlacement;
  configuration?: Partial<RunConfiguration>;
  retry?: RetryPolicy;
}

export interface SimulationResult extends BuildResult {
  schema: TreeSchema;
  partitioning: PartyAttributes[];
}

/** Party ids are `party1`, `party2`, ... in ring order. */
export function simulationPartitioning(
  dataset: Dataset,
  parties: number,
  classPlacement: ClassPlacement = 'all'
): PartyAttributes[] {
  return distributeAttributes(dataset.attributes.length, dataset.classIndex, parties, classPlacement).map(
    (attributeIndices, i) => ({ partyId: `party${i + 1}`, attributeIndices })
  );
}

/**
 * Splits one dataset vertically and runs the full protocol on it: a
 * coordinator plus one data party per slice, all in this process.
 */
export async function runSimulation(dataset: Dataset, options: SimulationOptions): Promise<SimulationResult> {
  const partitioning = simulationPartitioning(dataset, options.parties, options.classPlacement);
  const basePort = options.basePort ?? DEFAULT_COORDINATOR_PORT;
  const network = new InProcessNetwork();
  const transportFor = (offset: number): MessageTransport =>
    options.transport === 'http'
      ? new HttpTransport({ port: basePort + offset, retry: options.retry })
      : network.transport(options.retry);

  console.log(
    `Simulating ${partitioning.length} parties over ${options.transport ?? 'memory'}: ` +
      partitioning.map(p => `${p.partyId}=[${p.attributeIndices.join(',')}]`).join(' ')
  );

  const coordinator = new CoordinatorNode({
    transport: transportFor(0),
    datasetName: dataset.relation,
    partitioning,
    configuration: { ...options.configuration, classIndex: options.configuration?.classIndex ?? dataset.classIndex },
  });
  // Every party gets the whole table and keeps only the columns the run assigns it
  const parties = partitioning.map(
    ({ partyId }, i) => new DataPartyNode({ nodeId: partyId, transport: transportFor(i + 1), dataset })
  );

  try {
    await coordinator.start();
    for (const party of parties) {
      coordinator.registerParty(party.nodeId, await party.start());
    }
    const result = await coordinator.run();
    const schema = coordinator.trainedSchema;
    if (!schema) {
      throw new ProtocolStateError('Coordinator finished without a schema');
    }
    return { ...result, schema, partitioning };
  } finally {
    const stopped = await Promise.allSettled([coordinator.stop(), ...parties.map(party => party.stop())]);
    stopped.forEach(outcome => {
      if (outcome.status === 'rejected') {
        console.warn(`Shutdown problem: ${describeError(outcome.reason)}`);
      }
    });
  }
}
