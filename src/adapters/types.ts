/**
 * Adapter Types
 * =============
 *
 * Adapters move relations across the engine boundary. Each one serves a
 * single source type (`memory`, `json`, `gee`, ...) and receives the
 * datasource path exactly as written in the query.
 *
 * @module
 */

import type { Relation } from '../internals/relation';

export type LoadMode = 'replace' | 'append';

export interface LoadOptions {
  mode: LoadMode;
  /** Append rows by position instead of by column name */
  byPosition?: boolean;
}

export interface SourceAdapter {
  /** Lower-case source type this adapter serves */
  readonly sourceType: string;

  extract(path: string): Promise<Relation>;

  /** Absent on read-only adapters */
  load?(relation: Relation, destination: string, options: LoadOptions): Promise<void>;
}
