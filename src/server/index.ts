/**
 * Query Server Module
 * ===================
 *
 * WebSocket access to a `QueryEngine`.
 *
 * ```ts
 * import { QueryServer, loadServerConfig } from 'terraql/server';
 *
 * const server = new QueryServer(loadServerConfig());
 * await server.start();
 * ```
 */

export { QueryServer, SERVER_VERSION } from './QueryServer';
export { loadServerConfig, ConfigError, DEFAULT_PORT, DEFAULT_MAX_ROWS, type ConfigIssue } from './config';
export { parseClientMessage } from './protocol';
export type {
  ClientMessage,
  ServerMessage,
  QueryServerConfig,
  ExecuteMessage,
  PingMessage,
  ServerInfoMessage,
  ResultMessage,
  ErrorMessage,
  ErrorCode,
  PongMessage,
} from './protocol';
