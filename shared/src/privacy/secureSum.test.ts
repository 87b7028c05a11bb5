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

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ProtocolStateError } from '../errors';
import { SecureSum, type SecureSumState } from './secureSum';

/** Passes one value per member around a ring whose first member initiates. */
function ringSum(values: number[], maskBits = 64): number {
  const members = values.map((_, i) => new SecureSum(`node${i}`, values.length, { maskBits }));
  let state: SecureSumState = members[0].initiate(values[0]);
  for (let i = 1; i < values.length; i++) {
    state = members[i].participate(state, values[i]);
  }
  return members[0].finalize(state);
}

describe('SecureSum', () => {
  it('recovers the exact sum for any ring of three or more members', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 1_000_000 }), { minLength: 3, maxLength: 8 }), values => {
        expect(ringSum(values)).toBe(values.reduce((a, b) => a + b, 0));
      })
    );
  });

  it('works at the smallest mask width', () => {
    expect(ringSum([4_000_000_000, 200_000_000, 94_967_295], 32)).toBe(4_294_967_295);
  });

  it('keeps the mask out of the share it sends', () => {
    const engine = new SecureSum('coordinator', 3);
    const share = engine.toShare(engine.initiate(5));
    expect(Object.keys(share).sort()).toEqual(['initiatorId', 'partialSum', 'round']);
  });

  it('shows intermediate members a partial sum that varies between runs', () => {
    const engine = new SecureSum('coordinator', 3);
    const seen = new Set<bigint>();
    for (let i = 0; i < 50; i++) {
      seen.add(engine.initiate(7).partialSum);
    }
    // Identical inputs, so only the mask can make them differ
    expect(seen.size).toBeGreaterThan(45);
  });

  it('spreads masked sums over the whole modulus', () => {
    const engine = new SecureSum('coordinator', 3, { maskBits: 32 });
    const modulus = 2n ** 32n;
    let upperHalf = 0;
    for (let i = 0; i < 400; i++) {
      if (engine.initiate(0).partialSum >= modulus / 2n) upperHalf++;
    }
    expect(upperHalf).toBeGreaterThan(120);
    expect(upperHalf).toBeLessThan(280);
  });

  it('refuses a two-member ring unless allowed', () => {
    expect(() => new SecureSum('coordinator', 2)).toThrow(ProtocolStateError);
    const engine = new SecureSum('coordinator', 2, { allowTwoParty: true });
    const other = new SecureSum('party1', 2, { allowTwoParty: true });
    expect(engine.finalize(other.participate(engine.initiate(3), 4))).toBe(7);
  });

  it('rejects rings smaller than two and invalid mask widths', () => {
    expect(() => new SecureSum('solo', 1)).toThrow(ProtocolStateError);
    expect(() => new SecureSum('coordinator', 3, { maskBits: 16 })).toThrow(ProtocolStateError);
    expect(() => new SecureSum('coordinator', 3, { maskBits: 36 })).toThrow(ProtocolStateError);
  });

  it('only lets the initiator finalize', () => {
    const initiator = new SecureSum('coordinator', 3);
    const party = new SecureSum('party1', 3);
    let state = initiator.initiate(1);
    state = party.participate(state, 2);
    state = new SecureSum('party2', 3).participate(state, 3);
    expect(() => party.finalize(state)).toThrow('Only the initiator coordinator may finalize this sum, not party1');
    expect(initiator.finalize(state)).toBe(6);
  });

  it('refuses to finalize before the share has been round the ring', () => {
    const initiator = new SecureSum('coordinator', 3);
    const state = new SecureSum('party1', 3).participate(initiator.initiate(1), 2);
    expect(() => initiator.finalize(state)).toThrow('Cannot finalize after round 2; the ring has 3 members');
  });

  it('refuses a share that already visited every member', () => {
    const initiator = new SecureSum('coordinator', 3);
    const party = new SecureSum('party1', 3);
    const full = party.participate(party.participate(initiator.initiate(0), 0), 0);
    expect(() => party.participate(full, 1)).toThrow(ProtocolStateError);
  });

  it('rejects negative and fractional values', () => {
    const engine = new SecureSum('coordinator', 3);
    expect(() => engine.initiate(-1)).toThrow(ProtocolStateError);
    expect(() => engine.initiate(1.5)).toThrow(ProtocolStateError);
  });

  it('sums vectors position by position and pads short contributions with zeros', () => {
    const initiator = new SecureSum('coordinator', 3);
    const states = initiator.initiateVector([], 3);
    const afterFirst = new SecureSum('party1', 3).participateVector(states.map(s => initiator.toShare(s)), [1, 2, 3]);
    const afterSecond = new SecureSum('party2', 3).participateVector(afterFirst, [10]);
    expect(initiator.finalizeVector(initiator.absorbVector(states, afterSecond))).toEqual([11, 2, 3]);
  });

  it('rejects a returned vector of the wrong length', () => {
    const initiator = new SecureSum('coordinator', 3);
    const states = initiator.initiateVector([1, 2]);
    expect(() => initiator.absorbVector(states, [initiator.toShare(states[0])])).toThrow(
      'Returned 1 shares for a vector of 2 sums'
    );
  });
});
