#!/usr/bin/env node
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

import { Command } from 'commander';
import dotenv from 'dotenv';
import { describeError } from '../../shared/src';
import { registerCoordinatorCommand } from './commands/coordinator';
import { registerDataPartyCommand } from './commands/dataparty';
import { registerPredictCommand } from './commands/predict';
import { registerTestCommand } from './commands/test';

dotenv.config();

export function createProgram(): Command {
  const program = new Command()
    .name('vertical-tree')
    .description('Decision trees over vertically partitioned data, built with a secure-sum ring');

  registerCoordinatorCommand(program);
  registerDataPartyCommand(program);
  registerTestCommand(program);
  registerPredictCommand(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
