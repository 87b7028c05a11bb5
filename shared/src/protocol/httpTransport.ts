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

import axios, { type AxiosInstance } from 'axios';
import { CONNECTION_RETRY_DELAY, MAX_CONNECTION_RETRIES, REQUEST_TIMEOUT } from '../constants';
import { ConnectivityError, ProtocolStateError, describeError } from '../errors';
import { parseMessage, type Message } from './messages';
import { createNodeApp, startServer, stopServer, type ListeningServer } from './nodeServer';
import {
  NodeStatusSchema,
  SendQueue,
  withRetries,
  type MessageTransport,
  type PeerConnection,
  type ProtocolNode,
  type RetryPolicy,
} from './transport';

export interface HttpTransportOptions {
  port: number;
  /** Interface to bind; all interfaces when omitted. */
  host?: string;
  /** Host name peers use to reach this node. */
  advertisedHost?: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
}

function trimSlash(address: string): string {
  return address.replace(/\/+$/, '');
}

class HttpPeerConnection implements PeerConnection {
  private readonly client: AxiosInstance;
  private readonly queue = new SendQueue();
  private readonly controller = new AbortController();
  private closed = false;

  constructor(
    readonly peerId: string,
    readonly address: string,
    timeoutMs: number
  ) {
    this.client = axios.create({ baseURL: address, timeout: timeoutMs });
  }

  send(message: Message): Promise<Message> {
    return this.queue.run(async () => {
      if (this.closed) {
        throw new ConnectivityError(`Connection to ${this.peerId} is closed`);
      }
      let body: unknown;
      try {
        const response = await this.client.post<unknown>('/messages', message, { signal: this.controller.signal });
        body = response.data;
      } catch (error) {
        throw new ConnectivityError(
          `${message.type} to ${this.peerId} at ${this.address} failed: ${describeError(error)}`,
          { cause: error }
        );
      }
      return parseMessage(body);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();
  }
}

/** Express inbound, axios outbound. One axios instance per peer. */
export class HttpTransport implements MessageTransport {
  private listening: ListeningServer | null = null;
  private readonly connections = new Set<HttpPeerConnection>();
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;

  constructor(private readonly options: HttpTransportOptions) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT;
    this.retry = options.retry ?? { attempts: MAX_CONNECTION_RETRIES, delayMs: CONNECTION_RETRY_DELAY };
  }

  async listen(node: ProtocolNode): Promise<string> {
    if (this.listening) {
      throw new ProtocolStateError(`${node.nodeId} is already listening on port ${this.listening.port}`);
    }
    this.listening = await startServer(createNodeApp(node), this.options.port, this.options.host);
    const url = `http://${this.options.advertisedHost ?? 'localhost'}:${this.listening.port}`;
    console.log(`[${node.nodeId}] Listening on ${url}`);
    return url;
  }

  async connect(peerId: string, address: string): Promise<PeerConnection> {
    const baseUrl = trimSlash(address);
    const connection = await withRetries(`Connecting to ${peerId} at ${baseUrl}`, this.retry, async () => {
      const response = await axios.get<unknown>(`${baseUrl}/status`, { timeout: this.timeoutMs });
      const status = NodeStatusSchema.parse(response.data);
      if (status.nodeId !== peerId) {
        throw new ConnectivityError(`${baseUrl} answers as ${status.nodeId}, not ${peerId}`);
      }
      return new HttpPeerConnection(peerId, baseUrl, this.timeoutMs);
    });
    this.connections.add(connection);
    return connection;
  }

  async close(): Promise<void> {
    this.connections.forEach(connection => connection.close());
    this.connections.clear();
    if (this.listening) {
      const { server } = this.listening;
      this.listening = null;
      await stopServer(server);
    }
  }
}
