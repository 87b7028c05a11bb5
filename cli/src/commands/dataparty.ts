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
import { DataPartyNode } from '../../../client/src/services/DataPartyNode';
import { HttpTransport, loadArffFile, loadEnvironment } from '../../../shared/src';
import { parsePort } from './options';
import { stopOnSignal } from './shutdown';

interface DataPartyFlags {
  host?: string;
}

export function registerDataPartyCommand(program: Command): void {
  program
    .command('dataparty')
    .description('run a data party and register it with the coordinator')
    .argument('<nodeId>', 'id of this party')
    .argument('<port>', 'port to listen on', parsePort)
    .argument('<coordinatorHost>', 'host name of the coordinator')
    .argument('<coordinatorPort>', 'port of the coordinator', parsePort)
    .argument('[datasetFile]', 'ARFF file with this party\'s rows in the global column layout')
    .option('--host <name>', 'host name the coordinator and peers use to reach this party')
    .action(
      async (
        nodeId: string,
        port: number,
        coordinatorHost: string,
        coordinatorPort: number,
        datasetFile: string | undefined,
        flags: DataPartyFlags
      ) => {
        const env = loadEnvironment();
        // The class column is chosen by the run, not by the file
        const dataset = datasetFile ? loadArffFile(datasetFile, { classIndex: null }) : undefined;
        const party = new DataPartyNode({
          nodeId,
          transport: new HttpTransport({
            port,
            advertisedHost: flags.host,
            timeoutMs: env.requestTimeoutMs,
            retry: env.retry,
          }),
          dataset,
          coordinatorUrl: `http://${coordinatorHost}:${coordinatorPort}`,
          retry: env.retry,
          requestTimeoutMs: env.requestTimeoutMs,
        });
        if (dataset) {
          console.log(`[${nodeId}] Loaded ${dataset.rows.length} rows from ${datasetFile}`);
        } else {
          console.warn(`[${nodeId}] Started without a dataset; it cannot join a run`);
        }
        stopOnSignal(() => party.stop());
        await party.start();
      }
    );
}
