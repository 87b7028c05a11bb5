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

import type { Command } from 'commander';
import { CoordinatorNode } from '../../../server/src/coordinator';
import {
  DataFormatError,
  HttpTransport,
  loadEnvironment,
  parsePartitioning,
  saveModel,
  type BuildResult,
  type ClassPlacement,
  type TreeSchema,
} from '../../../shared/src';
import {
  addTrainingOptions,
  collect,
  parseClassPlacement,
  parseInteger,
  parsePort,
  trainingConfiguration,
  type TrainingFlags,
} from './options';
import { stopOnSignal } from './shutdown';

interface CoordinatorFlags extends TrainingFlags {
  parties?: number;
  party: string[];
  partition: string[];
  attributes?: number;
  classPlacement: ClassPlacement;
  dataset: string;
  output?: string;
}

function parsePartyAddress(entry: string): [string, string] {
  const separator = entry.indexOf('=');
  if (separator <= 0 || separator === entry.length - 1) {
    throw new DataFormatError(`Expected --party <id=url>, got "${entry}"`);
  }
  return [entry.slice(0, separator), entry.slice(separator + 1)];
}

/** Saves the finished tree; returns false when the run left no schema to save it with. */
export function writeTrainedTree(
  output: string,
  relation: string,
  schema: TreeSchema | null,
  result: BuildResult
): boolean {
  if (!schema) {
    console.warn(`No trained schema is available; not writing ${output}`);
    return false;
  }
  saveModel(output, {
    relation,
    attributes: [...schema.attributes],
    classIndex: schema.classIndex,
    tree: result.tree,
  });
  return true;
}

export function registerCoordinatorCommand(program: Command): void {
  addTrainingOptions(
    program
      .command('coordinator')
      .description('run the coordinator: wait for parties, then build the tree')
      .argument('<port>', 'port to listen on', parsePort)
      .option('--parties <n>', 'start building once this many parties have registered', parseInteger)
      .option('--party <id=url>', 'a party to register at startup (repeatable)', collect, [])
      .option('--partition <indices:partyId>', 'attributes held by one party, e.g. 0,1,4:party1 (repeatable)', collect, [])
      .option('--attributes <n>', 'without --partition, spread this many attributes over the parties', parseInteger)
      .option('--class-placement <all|last>', 'which parties hold the class column', parseClassPlacement, 'all')
      .option('--dataset <name>', 'dataset name announced to the parties', 'dataset')
      .option('--output <file>', 'write the finished tree as JSON')
  ).action(async (port: number, flags: CoordinatorFlags) => {
    const env = loadEnvironment();
    const preregistered = flags.party.map(parsePartyAddress);
    const coordinator = new CoordinatorNode({
      transport: new HttpTransport({ port, timeoutMs: env.requestTimeoutMs, retry: env.retry }),
      datasetName: flags.dataset,
      partitioning: flags.partition.length > 0 ? parsePartitioning(flags.partition) : undefined,
      attributeCount: flags.attributes,
      classPlacement: flags.classPlacement,
      configuration: trainingConfiguration(flags, env.maskBits),
      expectedParties: flags.parties ?? (preregistered.length > 0 ? preregistered.length : undefined),
      onResult: (result: BuildResult) => {
        if (flags.output) {
          writeTrainedTree(flags.output, flags.dataset, coordinator.trainedSchema, result);
        }
      },
    });

    await coordinator.start();
    stopOnSignal(() => coordinator.stop());
    for (const [partyId, url] of preregistered) {
      coordinator.registerParty(partyId, url);
    }
  });
}
