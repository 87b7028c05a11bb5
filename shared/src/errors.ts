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

export const ERROR_CODES = [
  'CONNECTIVITY',
  'PROTOCOL_SEQUENCE',
  'SCHEMA_MISMATCH',
  'PROTOCOL_STATE',
  'DATA_FORMAT',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export abstract class VerticalTreeError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bind, connect or request failures. Fatal to the run once retries are spent. */
export class ConnectivityError extends VerticalTreeError {
  readonly code = 'CONNECTIVITY' as const;
}

/** A message arrived out of the expected round or state. Aborts one tree node. */
export class ProtocolSequenceError extends VerticalTreeError {
  readonly code = 'PROTOCOL_SEQUENCE' as const;
}

/** Array length or cardinality mismatch while counting. Excludes one candidate. */
export class SchemaMismatchError extends VerticalTreeError {
  readonly code = 'SCHEMA_MISMATCH' as const;
}

/** Contract violation, e.g. finalizing a sum at a non-initiator. Always fatal. */
export class ProtocolStateError extends VerticalTreeError {
  readonly code = 'PROTOCOL_STATE' as const;
}

/** Malformed dataset, record or configuration input. */
export class DataFormatError extends VerticalTreeError {
  readonly code = 'DATA_FORMAT' as const;
}

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  roundId?: string;
}

export function toErrorPayload(error: unknown, roundId?: string): ErrorPayload {
  if (error instanceof VerticalTreeError) {
    return { code: error.code, message: error.message, roundId };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'PROTOCOL_STATE', message, roundId };
}

export function errorFromPayload(payload: ErrorPayload, origin: string): VerticalTreeError {
  const message = `${origin}: ${payload.message}`;
  switch (payload.code) {
    case 'CONNECTIVITY':
      return new ConnectivityError(message);
    case 'PROTOCOL_SEQUENCE':
      return new ProtocolSequenceError(message);
    case 'SCHEMA_MISMATCH':
      return new SchemaMismatchError(message);
    case 'DATA_FORMAT':
      return new DataFormatError(message);
    case 'PROTOCOL_STATE':
      return new ProtocolStateError(message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
