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

import { InvalidArgumentError, type Command } from 'commander';
import {
  DEFAULT_COORDINATOR_PORT,
  loadArffFile,
  loadEnvironment,
  predictRow,
  renderTree,
  saveModel,
  type ClassPlacement,
} from '../../../shared/src';
import { runSimulation, type TransportKind } from '../simulation';
import {
  addTrainingOptions,
  parseClassPlacement,
  parseInteger,
  parsePort,
  trainingConfiguration,
  type TrainingFlags,
} from './options';

interface TestFlags extends TrainingFlags {
  parties: number;
  basePort: number;
  transport: TransportKind;
  classPlacement: ClassPlacement;
  output?: string;
}

function parseTransport(value: string): TransportKind {
  if (value === 'memory' || value === 'http') return value;
  throw new InvalidArgumentError('Transport must be "memory" or "http".');
}

export function registerTestCommand(program: Command): void {
  addTrainingOptions(
    program
      .command('test')
      .description('split a dataset over several local parties and build the tree end to end')
      .argument('<datasetFile>', 'ARFF dataset')
      .option('--parties <n>', 'number of data parties', parseInteger, 2)
      .option('--base-port <port>', 'coordinator port for --transport http; parties use the next ones', parsePort, DEFAULT_COORDINATOR_PORT)
      .option('--transport <memory|http>', 'how the nodes talk to each other', parseTransport, 'memory')
      .option('--class-placement <all|last>', 'which parties hold the class column', parseClassPlacement, 'all')
      .option('--output <file>', 'write the finished tree as JSON')
  ).action(async (datasetFile: string, flags: TestFlags) => {
    const env = loadEnvironment();
    const dataset = loadArffFile(datasetFile, { classIndex: flags.classIndex });
    console.log(`Loaded ${dataset.rows.length} rows, ${dataset.attributes.length} attributes from ${datasetFile}`);

    const result = await runSimulation(dataset, {
      parties: flags.parties,
      transport: flags.transport,
      basePort: flags.basePort,
      classPlacement: flags.classPlacement,
      configuration: trainingConfiguration(flags, env.maskBits),
      retry: env.retry,
    });

    console.log('\nDecision tree:');
    console.log(renderTree(result.tree, result.schema.attributes));
    const { report } = result;
    console.log(
      `\nNodes: ${report.nodes}, leaves: ${report.leaves}, depth: ${report.maxDepthReached}` +
        (report.abortedBranches.length > 0 ? `, aborted branches: ${report.abortedBranches.join(', ')}` : '')
    );

    const classAttribute = dataset.attributes[dataset.classIndex];
    const correct = dataset.rows.filter(
      row => predictRow(result.tree, dataset.attributes, row) === classAttribute.nominalValues[row[dataset.classIndex]]
    ).length;
    console.log(
      `Training accuracy: ${correct}/${dataset.rows.length} (${((100 * correct) / Math.max(dataset.rows.length, 1)).toFixed(2)}%)`
    );

    if (flags.output) {
      saveModel(flags.output, {
        relation: dataset.relation,
        attributes: dataset.attributes,
        classIndex: dataset.classIndex,
        tree: result.tree,
      });
    }
  });
}
