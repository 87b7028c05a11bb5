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

import { describe, expect, it } from 'vitest';
import { ProtocolSequenceError } from '../errors';
import { countRoundMessage, decodeShares, encodeShares, parseMessage, splitDecisionMessage } from './messages';

const round = countRoundMessage('party1', 'party2', {
  roundId: 'root/class/1',
  branchId: 'root',
  query: { kind: 'class' },
  width: 2,
  share: { initiatorId: 'coordinator', partialSums: ['5', '18446744073709551615'], round: 2 },
});

describe('parseMessage', () => {
  it('accepts a well-formed message', () => {
    expect(parseMessage(JSON.parse(JSON.stringify(round)))).toEqual(round);
  });

  it('rejects an unknown type', () => {
    expect(() => parseMessage({ ...round, type: 'Gossip' })).toThrow(ProtocolSequenceError);
  });

  it('rejects partial sums that are not decimal digits', () => {
    const tampered = { ...round, payload: { ...round.payload, share: { ...round.payload.share, partialSums: ['-1', '2'] } } };
    expect(() => parseMessage(tampered)).toThrow(/^Malformed message: payload\.share\.partialSums\.0/);
  });

  it('accepts each split decision form', () => {
    const leaf = splitDecisionMessage('coordinator', 'party1', { decision: 'leaf', branchId: 'root.1' });
    const complete = splitDecisionMessage('coordinator', 'party1', { decision: 'complete' });
    expect(parseMessage(leaf)).toEqual(leaf);
    expect(parseMessage(complete)).toEqual(complete);
  });
});

describe('encodeShares / decodeShares', () => {
  it('carries 64-bit sums as decimal strings', () => {
    const shares = [
      { initiatorId: 'coordinator', partialSum: 5n, round: 2 },
      { initiatorId: 'coordinator', partialSum: 2n ** 64n - 1n, round: 2 },
    ];
    expect(encodeShares(shares)).toEqual(round.payload.share);
    expect(decodeShares(round.payload.share)).toEqual(shares);
  });

  it('refuses empty or mixed vectors', () => {
    expect(() => encodeShares([])).toThrow(ProtocolSequenceError);
    expect(() =>
      encodeShares([
        { initiatorId: 'coordinator', partialSum: 1n, round: 1 },
        { initiatorId: 'coordinator', partialSum: 1n, round: 2 },
      ])
    ).toThrow('Shares in one vector must have the same initiator and round');
  });
});
