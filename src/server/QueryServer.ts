/**
 * Query Server
 * ============
 *
 * WebSocket server that runs queries for remote clients and returns the
 * resulting relations.
 *
 * ## Usage
 *
 * ```ts
 * import { QueryServer } from 'terraql/server';
 *
 * const server = new QueryServer({ port: 8787, maxRows: 1000 });
 * await server.start();
 * ```
 *
 * Every request runs on its own; a failing query only produces an `error`
 * message for that request.
 */

import { WebSocket, WebSocketServer } from 'ws';
import { QueryEngine } from '../core/QueryEngine';
import { AdapterRegistry } from '../adapters/AdapterRegistry';
import { MemoryAdapter } from '../adapters/MemoryAdapter';
import { JsonFileAdapter } from '../adapters/JsonFileAdapter';
import { isQueryError } from '../errors';
import { DEFAULT_MAX_ROWS } from './config';
import {
  parseClientMessage,
  type ErrorMessage,
  type ExecuteMessage,
  type QueryServerConfig,
  type ResultMessage,
  type ServerInfoMessage,
  type ServerMessage,
} from './protocol';

export const SERVER_VERSION = '0.1.0';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ClientConnection {
  id: string;
  ws: WebSocket;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export class QueryServer {
  readonly engine: QueryEngine;
  private config: QueryServerConfig;
  private wss: WebSocketServer | null = null;
  private clients = new Map<string, ClientConnection>();
  private clientIdCounter = 0;

  /** Without an engine, serves the `memory` and `json` source types */
  constructor(config: QueryServerConfig, engine?: QueryEngine) {
    this.config = config;
    this.engine = engine ?? new QueryEngine({
      adapters: new AdapterRegistry([
        new MemoryAdapter(),
        new JsonFileAdapter({ baseDir: config.dataDir }),
      ]),
      debug: config.debug,
    });
  }

  // ============ PUBLIC API ============

  /** Port actually bound, once started (differs from config when it is 0) */
  get port(): number | null {
    const address = this.wss?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  start(): Promise<void> {
    const { port, host } = this.config;
    console.log(`[QueryServer] Starting server on port ${port}...`);

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });
      this.wss = wss;

      wss.once('listening', () => {
        console.log(`[QueryServer] Server ready. Listening on ws://${host ?? 'localhost'}:${this.port ?? port}`);
        resolve();
      });

      wss.once('error', (err: Error) => {
        console.error('[QueryServer] Failed to start:', err.message);
        reject(err);
      });

      wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));
    });
  }

  stop(): Promise<void> {
    console.log('[QueryServer] Stopping server...');

    for (const client of this.clients.values()) {
      client.ws.close();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();

    return new Promise((resolve, reject) => {
      wss.close(err => {
        if (err) {
          reject(err);
          return;
        }
        console.log('[QueryServer] Server stopped.');
        resolve();
      });
    });
  }

  serverInfo(): ServerInfoMessage {
    return {
      type: 'server-info',
      version: SERVER_VERSION,
      sourceTypes: this.engine.adapters.sourceTypes,
    };
  }

  /**
   * Process one raw client frame and return the reply.
   * Never rejects: every failure becomes an `error` message.
   */
  async handleMessage(raw: string): Promise<ServerMessage> {
    const msg = parseClientMessage(raw);
    if (typeof msg === 'string') {
      return { type: 'error', code: 'INVALID_MESSAGE', message: msg };
    }

    switch (msg.type) {
      case 'ping':
        return { type: 'pong', timestamp: msg.timestamp, serverTime: Date.now() };
      case 'execute':
        return this.handleExecute(msg);
    }
  }

  // ============ CONNECTIONS ============

  private handleConnection(ws: WebSocket): void {
    const clientId = `client_${++this.clientIdCounter}`;
    console.log(`[QueryServer] Client connected: ${clientId}`);

    const client: ClientConnection = { id: clientId, ws };
    this.clients.set(clientId, client);

    this.send(ws, this.serverInfo());

    ws.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      this.handleMessage(data.toString())
        .then(reply => this.send(ws, reply))
        .catch((err: unknown) => {
          console.error(`[QueryServer] Failed to reply to ${clientId}:`, err);
        });
    });

    ws.on('close', () => {
      console.log(`[QueryServer] Client disconnected: ${clientId}`);
      this.clients.delete(clientId);
    });

    ws.on('error', (err: Error) => {
      console.error(`[QueryServer] Client error (${clientId}):`, err.message);
    });
  }

  // ============ QUERIES ============

  private async handleExecute(msg: ExecuteMessage): Promise<ResultMessage | ErrorMessage> {
    const { requestId, query } = msg;
    if (this.config.debug) {
      console.log(`[QueryServer] ${requestId}: ${query.substring(0, 100)}`);
    }

    try {
      const relation = await this.engine.execute(query);
      const maxRows = this.config.maxRows ?? DEFAULT_MAX_ROWS;
      const rows = relation.rows.slice(0, maxRows).map(row => [...row]);
      return {
        type: 'result',
        requestId,
        columns: [...relation.columns],
        rows,
        rowCount: relation.rowCount,
        truncated: relation.rowCount > rows.length,
      };
    } catch (err) {
      if (isQueryError(err)) {
        if (this.config.debug) {
          console.log(`[QueryServer] ${requestId} failed: ${err.kind}`);
        }
        return { type: 'error', requestId, code: err.kind, message: err.message, details: err.details };
      }
      console.error(`[QueryServer] Unexpected failure for ${requestId}:`, err);
      return {
        type: 'error',
        requestId,
        code: 'INTERNAL_ERROR',
        message: err instanceof Error ? err.message : 'Failed to execute query',
      };
    }
  }

  // ============ HELPERS ============

  private send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }
}
