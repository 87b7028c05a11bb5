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

import { randomBytes } from 'crypto';
import { DEFAULT_MASK_BITS, MIN_MASK_BITS } from '../constants';
import { ProtocolStateError } from '../errors';

/** What travels around the ring. Intermediate parties only ever see this. */
export interface SecureSumShare {
  initiatorId: string;
  partialSum: bigint;
  round: number;
}

/** The initiator's private view: the share plus the mask it drew. */
export interface SecureSumState extends SecureSumShare {
  randomMask: bigint;
}

export interface SecureSumOptions {
  maskBits?: number;
  /**
   * With two members the participant learns the initiator's value as
   * `sum - own`; refuse that ring unless the caller opts in.
   */
  allowTwoParty?: boolean;
}

/**
 * Additive-masking secure sum over an ordered ring of `ringSize` members.
 *
 * The initiator adds a uniform mask drawn modulo 2^maskBits to its own
 * value; every other member adds its value exactly once, in ring order;
 * the share comes back to the initiator, who removes the mask. All
 * arithmetic is modulo 2^maskBits, so any partial sum seen in transit is
 * uniform and says nothing about an individual addend.
 */
export class SecureSum {
  private readonly modulus: bigint;
  private readonly maskBytes: number;

  constructor(
    private readonly nodeId: string,
    private readonly ringSize: number,
    options: SecureSumOptions = {}
  ) {
    const maskBits = options.maskBits ?? DEFAULT_MASK_BITS;
    if (!Number.isInteger(maskBits) || maskBits < MIN_MASK_BITS || maskBits % 8 !== 0) {
      throw new ProtocolStateError(
        `Mask width must be a multiple of 8 bits and at least ${MIN_MASK_BITS}, got ${maskBits}`
      );
    }
    if (!Number.isInteger(ringSize) || ringSize < 2) {
      throw new ProtocolStateError(`Secure sum needs at least 2 ring members, got ${ringSize}`);
    }
    if (ringSize === 2) {
      if (!options.allowTwoParty) {
        throw new ProtocolStateError(
          'A two-member ring reveals the initiator\'s value to the other member; at least 3 members are required'
        );
      }
      console.warn(`[${nodeId}] Secure sum over a two-member ring gives no privacy to the initiator`);
    }
    this.maskBytes = maskBits / 8;
    this.modulus = 1n << BigInt(maskBits);
  }

  get size(): number {
    return this.ringSize;
  }

  initiate(localValue: number): SecureSumState {
    const value = this.checkValue(localValue);
    const randomMask = this.drawMask();
    return {
      initiatorId: this.nodeId,
      randomMask,
      partialSum: (value + randomMask) % this.modulus,
      round: 1,
    };
  }

  participate<S extends SecureSumShare>(state: S, localValue: number): S {
    const value = this.checkValue(localValue);
    if (state.round >= this.ringSize) {
      throw new ProtocolStateError(
        `Share for ${state.initiatorId} already visited all ${this.ringSize} ring members`
      );
    }
    return {
      ...state,
      partialSum: (state.partialSum + value) % this.modulus,
      round: state.round + 1,
    };
  }

  finalize(state: SecureSumState): number {
    if (state.initiatorId !== this.nodeId) {
      throw new ProtocolStateError(
        `Only the initiator ${state.initiatorId} may finalize this sum, not ${this.nodeId}`
      );
    }
    if (state.round !== this.ringSize) {
      throw new ProtocolStateError(
        `Cannot finalize after round ${state.round}; the ring has ${this.ringSize} members`
      );
    }
    const sum = (((state.partialSum - state.randomMask) % this.modulus) + this.modulus) % this.modulus;
    if (sum > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ProtocolStateError(`Secure sum ${sum} exceeds the safe integer range`);
    }
    return Number(sum);
  }

  /** Strips the mask before a state leaves the initiator. */
  toShare(state: SecureSumShare): SecureSumShare {
    return { initiatorId: state.initiatorId, partialSum: state.partialSum, round: state.round };
  }

  /** Recombines the kept mask with the share that came back around the ring. */
  absorb(pending: SecureSumState, returned: SecureSumShare): SecureSumState {
    if (returned.initiatorId !== pending.initiatorId) {
      throw new ProtocolStateError(
        `Returned share belongs to ${returned.initiatorId}, expected ${pending.initiatorId}`
      );
    }
    return { ...pending, partialSum: returned.partialSum, round: returned.round };
  }

  initiateVector(localValues: readonly number[], width: number = localValues.length): SecureSumState[] {
    const states: SecureSumState[] = [];
    for (let i = 0; i < width; i++) {
      states.push(this.initiate(i < localValues.length ? localValues[i] : 0));
    }
    return states;
  }

  participateVector<S extends SecureSumShare>(states: readonly S[], localValues: readonly number[]): S[] {
    return states.map((state, i) => this.participate(state, i < localValues.length ? localValues[i] : 0));
  }

  finalizeVector(states: readonly SecureSumState[]): number[] {
    return states.map(state => this.finalize(state));
  }

  absorbVector(pending: readonly SecureSumState[], returned: readonly SecureSumShare[]): SecureSumState[] {
    if (pending.length !== returned.length) {
      throw new ProtocolStateError(
        `Returned ${returned.length} shares for a vector of ${pending.length} sums`
      );
    }
    return pending.map((state, i) => this.absorb(state, returned[i]));
  }

  private drawMask(): bigint {
    return BigInt(`0x${randomBytes(this.maskBytes).toString('hex')}`);
  }

  private checkValue(localValue: number): bigint {
    if (!Number.isSafeInteger(localValue) || localValue < 0) {
      throw new ProtocolStateError(`Secure sum values must be non-negative integers, got ${localValue}`);
    }
    return BigInt(localValue);
  }
}
