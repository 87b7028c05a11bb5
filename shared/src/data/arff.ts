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
import { MISSING_VALUE, NUMERIC_BINS } from '../constants';
import { DataFormatError } from '../errors';
import type { AttributeMetadata, Dataset } from '../types';

export interface ArffOptions {
  /** Defaults to the last attribute; `null` for a slice that holds no class column. */
  classIndex?: number | null;
}

function unquote(token: string): string {
  const t = token.trim();
  if (t.length >= 2 && ((t.startsWith("'") && t.endsWith("'")) || (t.startsWith('"') && t.endsWith('"')))) {
    return t.slice(1, -1).replace(/\\(['"\\])/g, '$1');
  }
  return t;
}

/** Splits on commas outside quotes. */
function splitFields(text: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      current += ch;
      if (ch === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (ch === quote) {
        quote = null;
      }
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      current += ch;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (quote) {
    throw new DataFormatError(`Unterminated quote in "${text}"`);
  }
  fields.push(current);
  return fields.map(unquote);
}

/** Reads the attribute name, which may be quoted, and returns the rest of the line. */
function takeName(rest: string): [string, string] {
  const trimmed = rest.trimStart();
  const first = trimmed[0];
  if (first === "'" || first === '"') {
    const end = trimmed.indexOf(first, 1);
    if (end < 0) throw new DataFormatError(`Unterminated attribute name in "${rest}"`);
    return [trimmed.slice(1, end), trimmed.slice(end + 1).trim()];
  }
  const match = /^(\S+)\s*(.*)$/.exec(trimmed);
  if (!match) throw new DataFormatError(`Missing attribute name in "${rest}"`);
  return [match[1], match[2].trim()];
}

function parseAttribute(rest: string): AttributeMetadata {
  const [name, type] = takeName(rest);
  if (type.startsWith('{')) {
    if (!type.endsWith('}')) {
      throw new DataFormatError(`Unterminated nominal specification for attribute ${name}`);
    }
    const nominalValues = splitFields(type.slice(1, -1)).filter(v => v.length > 0);
    if (nominalValues.length === 0) {
      throw new DataFormatError(`Nominal attribute ${name} declares no values`);
    }
    return { name, kind: 'nominal', nominalValues };
  }
  const lowered = type.toLowerCase();
  if (lowered === 'numeric' || lowered === 'real' || lowered === 'integer') {
    return { name, kind: 'numeric', nominalValues: [] };
  }
  throw new DataFormatError(`Unsupported type "${type}" for attribute ${name}`);
}

/** Ten equal-width bins over [0, 1]; values outside clamp to the end bins. */
export function discretizeNumeric(value: number): number {
  if (Number.isNaN(value)) return MISSING_VALUE;
  if (value <= 0) return 0;
  if (value >= 1) return NUMERIC_BINS - 1;
  return Math.floor(value * NUMERIC_BINS);
}

function encodeCell(raw: string, attribute: AttributeMetadata, line: number): number {
  if (raw === '?' || raw === '') return MISSING_VALUE;
  if (attribute.kind === 'nominal') {
    const index = attribute.nominalValues.indexOf(raw);
    if (index < 0) {
      throw new DataFormatError(`Line ${line}: "${raw}" is not a declared value of ${attribute.name}`);
    }
    return index;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new DataFormatError(`Line ${line}: "${raw}" is not numeric for ${attribute.name}`);
  }
  return discretizeNumeric(value);
}

export function loadArff(text: string, options: ArffOptions = {}): Dataset {
  let relation = '';
  const attributes: AttributeMetadata[] = [];
  const rows: number[][] = [];
  let inData = false;

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, i) => {
    const lineNumber = i + 1;
    const line = rawLine.trim();
    if (line === '' || line.startsWith('%')) return;

    if (!inData) {
      const match = /^@(\w+)\s*(.*)$/.exec(line);
      if (!match) {
        throw new DataFormatError(`Line ${lineNumber}: expected a header declaration, got "${line}"`);
      }
      const keyword = match[1].toLowerCase();
      if (keyword === 'relation') {
        relation = unquote(match[2]);
      } else if (keyword === 'attribute') {
        attributes.push(parseAttribute(match[2]));
      } else if (keyword === 'data') {
        inData = true;
      } else {
        throw new DataFormatError(`Line ${lineNumber}: unknown declaration @${match[1]}`);
      }
      return;
    }

    if (line.startsWith('{')) {
      throw new DataFormatError(`Line ${lineNumber}: sparse instances are not supported`);
    }
    const fields = splitFields(line);
    if (fields.length !== attributes.length) {
      throw new DataFormatError(
        `Line ${lineNumber}: expected ${attributes.length} values, got ${fields.length}`
      );
    }
    rows.push(fields.map((field, j) => encodeCell(field, attributes[j], lineNumber)));
  });

  if (attributes.length === 0) {
    throw new DataFormatError('Dataset declares no attributes');
  }
  if (!inData) {
    throw new DataFormatError('Dataset has no @data section');
  }

  if (options.classIndex === null) {
    return { relation, attributes, rows, classIndex: -1 };
  }
  const classIndex = options.classIndex ?? attributes.length - 1;
  if (!Number.isInteger(classIndex) || classIndex < 0 || classIndex >= attributes.length) {
    throw new DataFormatError(`Class index ${classIndex} is outside the ${attributes.length} attributes`);
  }
  if (attributes[classIndex].kind !== 'nominal') {
    throw new DataFormatError(`Class attribute ${attributes[classIndex].name} must be nominal`);
  }

  return { relation, attributes, rows, classIndex };
}

export function loadArffFile(filePath: string, options: ArffOptions = {}): Dataset {
  if (!fs.existsSync(filePath)) {
    throw new DataFormatError(`Dataset file not found: ${filePath}`);
  }
  return loadArff(fs.readFileSync(filePath, 'utf-8'), options);
}
