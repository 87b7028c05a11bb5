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
import {
  DistributedTreeBuilder,
  LocalStatistics,
  classify,
  loadArffFile,
  loadModel,
  parseValuesFile,
  type SavedModel,
} from '../../../shared/src';

interface PredictFlags {
  tree?: string;
}

/** Trains on the whole dataset in one place; used when no saved tree is given. */
async function trainLocally(datasetFile: string): Promise<SavedModel> {
  const dataset = loadArffFile(datasetFile);
  const { tree } = await new DistributedTreeBuilder(new LocalStatistics(dataset), dataset).build();
  return { relation: dataset.relation, attributes: dataset.attributes, classIndex: dataset.classIndex, tree };
}

export function registerPredictCommand(program: Command): void {
  program
    .command('predict')
    .description('classify one record')
    .argument('<datasetFile>', 'ARFF dataset to train on when --tree is not given')
    .argument('<recordFile>', 'record as name<TAB>value lines')
    .option('--tree <json>', 'use a tree saved by coordinator --output or test --output')
    .action(async (datasetFile: string, recordFile: string, flags: PredictFlags) => {
      const model = flags.tree ? loadModel(flags.tree) : await trainLocally(datasetFile);
      const features = parseValuesFile(recordFile, { attributes: model.attributes });
      const leaf = classify(model.tree, features);
      console.log(`Prediction: ${leaf.classLabel}`);
      console.log(`Class distribution at leaf: [${leaf.classDistribution.join(', ')}]`);
    });
}
