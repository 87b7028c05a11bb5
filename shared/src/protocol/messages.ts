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

import { z } from 'zod';
import { ERROR_CODES, ProtocolSequenceError, type ErrorPayload } from '../errors';
import type { SecureSumShare } from '../privacy/secureSum';

// ─── Shared ──────────────────────────────────────────────────────────────────

const NodeIdSchema = z.string().min(1);
const RowIndexSchema = z.number().int().nonnegative();

export const AttributeMetadataSchema = z.object({
  name: z.string(),
  kind: z.enum(['numeric', 'nominal']),
  nominalValues: z.array(z.string()).readonly(),
});

export const BranchAssignmentsSchema = z.object({
  children: z.array(z.array(RowIndexSchema)),
  unrouted: z.array(RowIndexSchema),
});

/** Partial sums travel as decimal strings; JSON numbers cannot hold 64 bits. */
export const WireShareSchema = z.object({
  initiatorId: NodeIdSchema,
  partialSums: z.array(z.string().regex(/^\d+$/)),
  round: z.number().int().positive(),
});

export type WireShare = z.infer<typeof WireShareSchema>;

// ─── Payloads ────────────────────────────────────────────────────────────────

export const InitiationPayloadSchema = z.object({
  coordinatorId: NodeIdSchema,
  participatingNodes: z.array(NodeIdSchema).min(1),
  datasetName: z.string(),
  attributePartitioning: z.array(z.string()),
  configuration: z.record(z.string()),
  endpoints: z.record(z.string().min(1)),
});

export const CountQuerySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('class') }),
  z.object({ kind: z.literal('attribute'), attributeIndex: z.number().int().nonnegative() }),
]);

export type CountQuery = z.infer<typeof CountQuerySchema>;

export const CountRoundPayloadSchema = z.object({
  roundId: z.string().min(1),
  branchId: z.string().min(1),
  query: CountQuerySchema,
  width: z.number().int().positive(),
  share: WireShareSchema,
});

export const SplitDecisionPayloadSchema = z.discriminatedUnion('decision', [
  z.object({
    decision: z.literal('split'),
    branchId: z.string().min(1),
    attributeIndex: z.number().int().nonnegative(),
    childBranchIds: z.array(z.string().min(1)),
    assignments: BranchAssignmentsSchema.optional(),
  }),
  z.object({ decision: z.literal('leaf'), branchId: z.string().min(1) }),
  z.object({ decision: z.literal('complete') }),
]);

export const AckPayloadSchema = z.discriminatedUnion('acknowledgedType', [
  z.object({
    acknowledgedType: z.literal('Initiation'),
    rowCount: z.number().int().nonnegative(),
    attributes: z.array(z.object({ index: z.number().int().nonnegative(), metadata: AttributeMetadataSchema })),
  }),
  z.object({ acknowledgedType: z.literal('CountRound'), roundId: z.string() }),
  z.object({
    acknowledgedType: z.literal('SplitDecision'),
    branchId: z.string().optional(),
    assignments: BranchAssignmentsSchema.optional(),
  }),
]);

export const ErrorMessagePayloadSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  roundId: z.string().optional(),
});

export type InitiationPayload = z.infer<typeof InitiationPayloadSchema>;
export type CountRoundPayload = z.infer<typeof CountRoundPayloadSchema>;
export type SplitDecisionPayload = z.infer<typeof SplitDecisionPayloadSchema>;
export type AckPayload = z.infer<typeof AckPayloadSchema>;

// ─── Messages ────────────────────────────────────────────────────────────────

const envelope = {
  sourceId: NodeIdSchema,
  destinationId: NodeIdSchema,
};

export const InitiationMessageSchema = z.object({
  ...envelope,
  type: z.literal('Initiation'),
  payload: InitiationPayloadSchema,
});

export const CountRoundMessageSchema = z.object({
  ...envelope,
  type: z.literal('CountRound'),
  payload: CountRoundPayloadSchema,
});

export const SplitDecisionMessageSchema = z.object({
  ...envelope,
  type: z.literal('SplitDecision'),
  payload: SplitDecisionPayloadSchema,
});

export const AckMessageSchema = z.object({
  ...envelope,
  type: z.literal('Ack'),
  payload: AckPayloadSchema,
});

export const ErrorMessageSchema = z.object({
  ...envelope,
  type: z.literal('Error'),
  payload: ErrorMessagePayloadSchema,
});

/**
 * The closed set of protocol messages. `safeParse` at every receiving
 * boundary; the `type` literal picks the payload schema.
 */
export const MessageSchema = z.discriminatedUnion('type', [
  InitiationMessageSchema,
  CountRoundMessageSchema,
  SplitDecisionMessageSchema,
  AckMessageSchema,
  ErrorMessageSchema,
]);

export type Message = z.infer<typeof MessageSchema>;
export type MessageType = Message['type'];
export type InitiationMessage = z.infer<typeof InitiationMessageSchema>;
export type CountRoundMessage = z.infer<typeof CountRoundMessageSchema>;
export type SplitDecisionMessage = z.infer<typeof SplitDecisionMessageSchema>;
export type AckMessage = z.infer<typeof AckMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;

export function parseMessage(body: unknown): Message {
  const result = MessageSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ProtocolSequenceError(`Malformed message: ${issues.join('; ')}`);
  }
  return result.data;
}

export function initiationMessage(sourceId: string, destinationId: string, payload: InitiationPayload): InitiationMessage {
  return { sourceId, destinationId, type: 'Initiation', payload };
}

export function countRoundMessage(sourceId: string, destinationId: string, payload: CountRoundPayload): CountRoundMessage {
  return { sourceId, destinationId, type: 'CountRound', payload };
}

export function splitDecisionMessage(
  sourceId: string,
  destinationId: string,
  payload: SplitDecisionPayload
): SplitDecisionMessage {
  return { sourceId, destinationId, type: 'SplitDecision', payload };
}

export function ackMessage(sourceId: string, destinationId: string, payload: AckPayload): AckMessage {
  return { sourceId, destinationId, type: 'Ack', payload };
}

export function errorMessage(sourceId: string, destinationId: string, payload: ErrorPayload): ErrorMessage {
  return { sourceId, destinationId, type: 'Error', payload };
}

/** Packs one share per matrix cell into the wire form; all cells share initiator and round. */
export function encodeShares(shares: readonly SecureSumShare[]): WireShare {
  const first = shares[0];
  if (!first) {
    throw new ProtocolSequenceError('Cannot send an empty share vector');
  }
  if (shares.some(s => s.initiatorId !== first.initiatorId || s.round !== first.round)) {
    throw new ProtocolSequenceError('Shares in one vector must have the same initiator and round');
  }
  return {
    initiatorId: first.initiatorId,
    partialSums: shares.map(s => s.partialSum.toString()),
    round: first.round,
  };
}

export function decodeShares(wire: WireShare): SecureSumShare[] {
  return wire.partialSums.map(sum => ({
    initiatorId: wire.initiatorId,
    partialSum: BigInt(sum),
    round: wire.round,
  }));
}
