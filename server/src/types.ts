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

import type { BuildReport, NodeState } from '../../shared/src';

export interface PartyInfo {
  partyId: string;
  url: string;
  status: 'registered' | 'connected' | 'initiated' | 'unreachable';
  lastUpdate: Date;
  rowCount?: number;
  attributeIndices?: number[];
}

export interface RoundCounters {
  started: number;
  completed: number;
  failed: number;
}

export interface RunProgress {
  state: NodeState;
  datasetName: string;
  parties: {
    registered: number;
    expected: number | null;
  };
  rounds: RoundCounters;
  splits: number;
  report: BuildReport | null;
  error: string | null;
}
