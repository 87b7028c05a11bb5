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

import { describeError } from '../../../shared/src';

/** Stops a long-running node on Ctrl-C or SIGTERM and exits cleanly. */
export function stopOnSignal(stop: () => Promise<void>): void {
  const handler = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down...`);
    stop().then(
      () => process.exit(0),
      error => {
        console.error('Shutdown failed:', describeError(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}
