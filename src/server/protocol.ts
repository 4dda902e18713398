/**
 * Query Server Protocol
 * =====================
 *
 * JSON messages exchanged over the WebSocket connection.
 *
 * ```
 * client ──{ type: 'execute', requestId, query }──▶ server
 * client ◀──{ type: 'result' | 'error', requestId, ... }── server
 * ```
 *
 * @module
 */

import type { Cell } from '../sql/ast-types';
import type { ErrorDetails, QueryErrorKind } from '../errors';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export interface QueryServerConfig {
  port: number;
  /** Interface to bind; all interfaces when absent */
  host?: string;
  /** Rows returned per result; `rowCount` still reports the full size */
  maxRows?: number;
  /** Base directory of the json adapter */
  dataDir?: string;
  /** Enable debug logging */
  debug?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT → SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExecuteMessage {
  type: 'execute';
  requestId: string;
  query: string;
}

export interface PingMessage {
  type: 'ping';
  timestamp: number;
}

export type ClientMessage = ExecuteMessage | PingMessage;

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER → CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerInfoMessage {
  type: 'server-info';
  version: string;
  sourceTypes: string[];
}

export interface ResultMessage {
  type: 'result';
  requestId: string;
  columns: string[];
  rows: Cell[][];
  rowCount: number;
  truncated: boolean;
}

export type ErrorCode = QueryErrorKind | 'INVALID_MESSAGE' | 'INTERNAL_ERROR';

export interface ErrorMessage {
  type: 'error';
  requestId?: string;
  code: ErrorCode;
  message: string;
  details?: ErrorDetails;
}

export interface PongMessage {
  type: 'pong';
  timestamp: number;
  serverTime: number;
}

export type ServerMessage = ServerInfoMessage | ResultMessage | ErrorMessage | PongMessage;

// ═══════════════════════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════════════════════

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Decode a raw client frame; returns a reason string when it is not a valid message */
export function parseClientMessage(raw: string): ClientMessage | string {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch (err) {
    return `message is not valid JSON (${err instanceof Error ? err.message : String(err)})`;
  }
  if (!isObject(msg)) {
    return 'message must be a JSON object';
  }

  switch (msg.type) {
    case 'execute': {
      const { requestId, query } = msg;
      if (typeof requestId !== 'string' || requestId === '') {
        return "'execute' requires a non-empty string requestId";
      }
      if (typeof query !== 'string') {
        return "'execute' requires a string query";
      }
      return { type: 'execute', requestId, query };
    }
    case 'ping': {
      const { timestamp } = msg;
      if (typeof timestamp !== 'number') {
        return "'ping' requires a numeric timestamp";
      }
      return { type: 'ping', timestamp };
    }
    default:
      return `unknown message type ${JSON.stringify(msg.type ?? null)}`;
  }
}
