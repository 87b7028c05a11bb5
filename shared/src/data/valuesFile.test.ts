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
import { DataFormatError } from '../errors';
import { parseValues } from './valuesFile';

const route = { name: 'route', kind: 'nominal' as const, nominalValues: ['north', 'south'] };

describe('parseValues', () => {
  it('reads numbers, flags and nominal labels', () => {
    const features = parseValues('route\tsouth\nexpress\tt\nload factor\t0.4\n\nreturned\tFALSE\n', {
      attributes: [route],
    });
    expect([...features.entries()]).toEqual([
      ['route', 1],
      ['express', 1],
      ['load factor', 0.4],
      ['returned', 0],
    ]);
  });

  it('needs the metadata to resolve labels', () => {
    expect(() => parseValues('route\tsouth')).toThrow('Line 1: invalid value "south" for feature route');
  });

  it('rejects lines without exactly one tab', () => {
    expect(() => parseValues('route south')).toThrow(DataFormatError);
    expect(() => parseValues('a\tb\tc')).toThrow(DataFormatError);
  });

  it('rejects an empty name', () => {
    expect(() => parseValues('\t1')).toThrow('Line 1: feature name is empty');
  });
});
