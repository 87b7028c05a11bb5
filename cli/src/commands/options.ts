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
import type { ClassPlacement, RunConfiguration } from '../../../shared/src';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function parsePort(value: string): number {
  const port = parseInteger(value);
  if (port < 0 || port > 65535) {
    throw new InvalidArgumentError(`${port} is not a valid port.`);
  }
  return port;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

export function parseClassPlacement(value: string): ClassPlacement {
  if (value === 'all' || value === 'last') return value;
  throw new InvalidArgumentError('Class placement must be "all" or "last".');
}

/** For repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Training options shared by `coordinator` and `test`. */
export interface TrainingFlags {
  maxDepth?: number;
  minInstances?: number;
  minGain?: number;
  classIndex?: number;
  allowTwoParty?: boolean;
}

export function addTrainingOptions(command: Command): Command {
  return command
    .option('--max-depth <n>', 'deepest level a split may sit at', parseInteger)
    .option('--min-instances <n>', 'smallest branch that may still be split', parseInteger)
    .option('--min-gain <ratio>', 'smallest gain ratio worth a split', parseNumber)
    .option('--class-index <n>', 'class column (default: last attribute)', parseInteger)
    .option('--allow-two-party', 'permit a ring of the coordinator and a single party');
}

export function trainingConfiguration(flags: TrainingFlags, maskBits: number): Partial<RunConfiguration> {
  return {
    maxDepth: flags.maxDepth,
    minInstances: flags.minInstances,
    minGainThreshold: flags.minGain,
    classIndex: flags.classIndex,
    allowTwoPartySum: flags.allowTwoParty ?? false,
    maskBits,
  };
}
