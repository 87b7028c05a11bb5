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

import type { Express } from 'express';
import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { ConnectivityError, describeError } from '../errors';
import { NODE_STATES } from './lifecycle';
import type { Message } from './messages';

export const NodeStatusSchema = z.object({
  nodeId: z.string().min(1),
  role: z.enum(['coordinator', 'dataparty']),
  state: z.enum(NODE_STATES),
});

export type NodeStatus = z.infer<typeof NodeStatusSchema>;

/** What a transport delivers inbound messages to. */
export interface ProtocolNode {
  readonly nodeId: string;
  /** Validates and handles one inbound message; always resolves with the reply, Ack or Error. */
  handleMessage(body: unknown): Promise<Message>;
  status(): NodeStatus;
  /** Routes served beside `/messages` and `/status` when the node listens over HTTP. */
  mountRoutes?(app: Express): void;
}

export interface PeerConnection {
  readonly peerId: string;
  readonly address: string;
  /** Sends one message and resolves with the peer's reply. */
  send(message: Message): Promise<Message>;
  close(): void;
}

export interface MessageTransport {
  /** Starts delivering messages to `node`; resolves with the address peers reach it at. */
  listen(node: ProtocolNode): Promise<string>;
  /** Opens a connection after a status handshake, retrying before giving up. */
  connect(peerId: string, address: string): Promise<PeerConnection>;
  /** Stops listening and fails every open connection's in-flight and later sends. */
  close(): Promise<void>;
}

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

/**
 * Runs tasks one after another. A connection funnels every send through
 * one queue, so it never has more than one request in flight.
 */
export class SendQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // Failures reach the caller through `result`; the queue only needs to move on
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export async function withRetries<T>(label: string, policy: RetryPolicy, task: () => Promise<T>): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      console.warn(`${label}: attempt ${attempt}/${attempts} failed: ${describeError(error)}`);
      if (attempt < attempts && policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }
  throw new ConnectivityError(`${label}: giving up after ${attempts} attempts: ${describeError(lastError)}`, {
    cause: lastError,
  });
}
