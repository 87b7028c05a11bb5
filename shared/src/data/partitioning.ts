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

import { DataFormatError } from '../errors';
import type { DataPartition } from '../types';

export interface PartyAttributes {
  partyId: string;
  attributeIndices: number[];
}

export type ClassPlacement = 'all' | 'last';

/**
 * Splits the non-class attributes into contiguous chunks, one per party;
 * earlier parties take one extra attribute while the remainder lasts. The
 * class column goes to every party or only to the last one.
 */
export function distributeAttributes(
  numAttributes: number,
  classIndex: number,
  numParties: number,
  classPlacement: ClassPlacement = 'all'
): number[][] {
  if (numParties < 1) {
    throw new DataFormatError(`Need at least one party, got ${numParties}`);
  }
  const nonClass: number[] = [];
  for (let i = 0; i < numAttributes; i++) {
    if (i !== classIndex) nonClass.push(i);
  }
  if (nonClass.length < numParties) {
    throw new DataFormatError(
      `Cannot give each of ${numParties} parties an attribute: only ${nonClass.length} non-class attributes`
    );
  }

  const perParty = Math.floor(nonClass.length / numParties);
  const remainder = nonClass.length % numParties;
  const distribution: number[][] = [];
  let next = 0;
  for (let p = 0; p < numParties; p++) {
    const take = perParty + (p < remainder ? 1 : 0);
    const indices = nonClass.slice(next, next + take);
    next += take;
    if (classPlacement === 'all' || p === numParties - 1) {
      indices.push(classIndex);
    }
    distribution.push(indices);
  }
  return distribution;
}

export function createVerticalPartition(rows: readonly number[][], attributeIndices: readonly number[]): DataPartition {
  return {
    attributeIndices: [...attributeIndices],
    rows: rows.map(row => attributeIndices.map(index => row[index])),
  };
}

/** Parses `"<csv-indices>:<partyId>"`, e.g. `"0,1,2:party1"`. */
export function parsePartitioning(entries: readonly string[]): PartyAttributes[] {
  const seen = new Set<string>();
  return entries.map(entry => {
    const separator = entry.lastIndexOf(':');
    if (separator <= 0 || separator === entry.length - 1) {
      throw new DataFormatError(`Invalid attribute partitioning entry "${entry}"`);
    }
    const partyId = entry.slice(separator + 1).trim();
    const attributeIndices = entry
      .slice(0, separator)
      .split(',')
      .map(part => {
        const index = Number(part.trim());
        if (part.trim() === '' || !Number.isInteger(index) || index < 0) {
          throw new DataFormatError(`Invalid attribute index "${part}" in "${entry}"`);
        }
        return index;
      });
    if (seen.has(partyId)) {
      throw new DataFormatError(`Party ${partyId} appears twice in the attribute partitioning`);
    }
    seen.add(partyId);
    return { partyId, attributeIndices };
  });
}

export function formatPartitioning(parties: readonly PartyAttributes[]): string[] {
  return parties.map(party => `${party.attributeIndices.join(',')}:${party.partyId}`);
}

/**
 * The primary owner of an attribute is the first party, in ring order,
 * whose partition lists it. Only primary owners contribute counts, so a
 * column replicated on several parties is never counted twice.
 */
export function resolvePrimaryOwners(
  partitioning: readonly PartyAttributes[],
  ringOrder: readonly string[]
): Map<number, string> {
  const byParty = new Map(partitioning.map(p => [p.partyId, p.attributeIndices] as const));
  const owners = new Map<number, string>();
  for (const partyId of ringOrder) {
    for (const index of byParty.get(partyId) ?? []) {
      if (!owners.has(index)) owners.set(index, partyId);
    }
  }
  return owners;
}
