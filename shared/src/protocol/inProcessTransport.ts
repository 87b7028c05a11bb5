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

import { CONNECTION_RETRY_DELAY, MAX_CONNECTION_RETRIES } from '../constants';
import { ConnectivityError } from '../errors';
import { parseMessage, type Message } from './messages';
import {
  SendQueue,
  withRetries,
  type MessageTransport,
  type NodeStatus,
  type PeerConnection,
  type ProtocolNode,
  type RetryPolicy,
} from './transport';

// Messages cross the boundary as JSON, like they do over HTTP
function roundTrip(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

/**
 * A set of nodes living in one process. Delivery serializes each message
 * and its reply, so nodes share no objects with each other.
 */
export class InProcessNetwork {
  private readonly nodes = new Map<string, ProtocolNode>();

  transport(retry?: RetryPolicy): InProcessTransport {
    return new InProcessTransport(this, retry);
  }

  attach(node: ProtocolNode): string {
    const address = `memory://${node.nodeId}`;
    if (this.nodes.has(address)) {
      throw new ConnectivityError(`Address ${address} is already in use`);
    }
    this.nodes.set(address, node);
    return address;
  }

  detach(address: string): void {
    this.nodes.delete(address);
  }

  status(address: string): NodeStatus | undefined {
    return this.nodes.get(address)?.status();
  }

  async deliver(address: string, message: Message): Promise<Message> {
    const node = this.nodes.get(address);
    if (!node) {
      throw new ConnectivityError(`Nothing is listening at ${address}`);
    }
    const reply = await node.handleMessage(roundTrip(message));
    return parseMessage(roundTrip(reply));
  }
}

class InProcessConnection implements PeerConnection {
  private readonly queue = new SendQueue();
  private closed = false;

  constructor(
    private readonly network: InProcessNetwork,
    readonly peerId: string,
    readonly address: string
  ) {}

  send(message: Message): Promise<Message> {
    return this.queue.run(async () => {
      if (this.closed) {
        throw new ConnectivityError(`Connection to ${this.peerId} is closed`);
      }
      return this.network.deliver(this.address, message);
    });
  }

  close(): void {
    this.closed = true;
  }
}

export class InProcessTransport implements MessageTransport {
  private address: string | null = null;
  private readonly connections = new Set<InProcessConnection>();
  private readonly retry: RetryPolicy;

  constructor(
    private readonly network: InProcessNetwork,
    retry?: RetryPolicy
  ) {
    this.retry = retry ?? { attempts: MAX_CONNECTION_RETRIES, delayMs: CONNECTION_RETRY_DELAY };
  }

  async listen(node: ProtocolNode): Promise<string> {
    this.address = this.network.attach(node);
    return this.address;
  }

  async connect(peerId: string, address: string): Promise<PeerConnection> {
    const connection = await withRetries(`Connecting to ${peerId} at ${address}`, this.retry, async () => {
      const status = this.network.status(address);
      if (!status) {
        throw new ConnectivityError(`Nothing is listening at ${address}`);
      }
      if (status.nodeId !== peerId) {
        throw new ConnectivityError(`${address} answers as ${status.nodeId}, not ${peerId}`);
      }
      return new InProcessConnection(this.network, peerId, address);
    });
    this.connections.add(connection);
    return connection;
  }

  async close(): Promise<void> {
    this.connections.forEach(connection => connection.close());
    this.connections.clear();
    if (this.address) {
      this.network.detach(this.address);
      this.address = null;
    }
  }
}
