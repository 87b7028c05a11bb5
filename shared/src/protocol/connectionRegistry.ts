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

import { ConnectivityError } from '../errors';
import type { PeerConnection } from './transport';

/**
 * The live connections a node holds, keyed by peer node id. Everything
 * else reaches a peer through `get`, never through its own reference.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, PeerConnection>();

  add(connection: PeerConnection): void {
    this.connections.get(connection.peerId)?.close();
    this.connections.set(connection.peerId, connection);
  }

  has(peerId: string): boolean {
    return this.connections.has(peerId);
  }

  get(peerId: string): PeerConnection {
    const connection = this.connections.get(peerId);
    if (!connection) {
      throw new ConnectivityError(`No connection to ${peerId}`);
    }
    return connection;
  }

  remove(peerId: string): void {
    this.connections.get(peerId)?.close();
    this.connections.delete(peerId);
  }

  closeAll(): void {
    this.connections.forEach(connection => connection.close());
    this.connections.clear();
  }
}
