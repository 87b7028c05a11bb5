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

import * as fs from 'fs';
import { DataFormatError } from '../errors';
import type { AttributeMetadata } from '../types';

const BOOLEAN_TOKENS = new Map<string, number>([
  ['t', 1],
  ['true', 1],
  ['f', 0],
  ['false', 0],
]);

export interface ValuesFileOptions {
  /** Lets nominal labels be written by name instead of by index. */
  attributes?: readonly AttributeMetadata[];
}

/**
 * Parses a single record written as `name<TAB>value` lines. Booleans may be
 * written `t`/`f`; everything else must be a number or, when metadata is
 * given, one of the attribute's nominal labels.
 */
export function parseValues(text: string, options: ValuesFileOptions = {}): Map<string, number> {
  const byName = new Map((options.attributes ?? []).map(a => [a.name, a] as const));
  const features = new Map<string, number>();

  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') return;

    const parts = line.split('\t');
    if (parts.length !== 2) {
      throw new DataFormatError(`Line ${i + 1}: expected "name<TAB>value", got "${line}"`);
    }
    const name = parts[0].trim();
    const token = parts[1].trim();
    if (name === '') {
      throw new DataFormatError(`Line ${i + 1}: feature name is empty`);
    }

    const attribute = byName.get(name);
    const flag = BOOLEAN_TOKENS.get(token.toLowerCase());
    let value: number;
    if (attribute?.kind === 'nominal' && attribute.nominalValues.includes(token)) {
      value = attribute.nominalValues.indexOf(token);
    } else if (flag !== undefined) {
      value = flag;
    } else if (token !== '' && Number.isFinite(Number(token))) {
      value = Number(token);
    } else {
      throw new DataFormatError(`Line ${i + 1}: invalid value "${token}" for feature ${name}`);
    }
    features.set(name, value);
  });

  return features;
}

export function parseValuesFile(filePath: string, options: ValuesFileOptions = {}): Map<string, number> {
  if (!fs.existsSync(filePath)) {
    throw new DataFormatError(`Values file not found: ${filePath}`);
  }
  return parseValues(fs.readFileSync(filePath, 'utf-8'), options);
}
