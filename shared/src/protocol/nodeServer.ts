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

import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import { MESSAGE_BODY_LIMIT } from '../constants';
import { ConnectivityError, describeError } from '../errors';
import type { ProtocolNode } from './transport';

/** The Express app every node serves: `POST /messages`, `GET /status`, and whatever the node mounts. */
export function createNodeApp(node: ProtocolNode): Express {
  const app = express();

  // CORS and JSON middleware
  app.use(cors());
  app.use(express.json({ limit: MESSAGE_BODY_LIMIT }));

  app.get('/status', (req: Request, res: Response) => {
    res.json(node.status());
  });

  app.post('/messages', async (req: Request, res: Response) => {
    try {
      res.json(await node.handleMessage(req.body));
    } catch (error) {
      console.error(`[${node.nodeId}] Error handling message:`, error);
      res.status(500).json({ error: describeError(error) });
    }
  });

  node.mountRoutes?.(app);
  return app;
}

export interface ListeningServer {
  server: Server;
  port: number;
}

export function startServer(app: Express, port: number, host?: string): Promise<ListeningServer> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once('error', error => {
      reject(new ConnectivityError(`Cannot listen on port ${port}: ${error.message}`, { cause: error }));
    });
    server.once('listening', () => {
      const address = server.address();
      resolve({ server, port: address !== null && typeof address === 'object' ? address.port : port });
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
    // Idle keep-alive sockets would otherwise hold close() open
    server.closeAllConnections();
  });
}
