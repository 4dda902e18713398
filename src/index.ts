/**
 * terraql: a compact query language over pluggable data sources
 * ==============================================================
 *
 * Compiles SELECT / INSERT statements into a structured plan of
 * extract, join, transform and load steps and runs it against adapters.
 *
 * ## Quick Start
 *
 * ```ts
 * import { QueryEngine, MemoryAdapter, JsonFileAdapter } from 'terraql';
 *
 * const engine = new QueryEngine({
 *   adapters: [new MemoryAdapter(), new JsonFileAdapter({ baseDir: './data' })],
 * });
 *
 * const east = await engine.execute(
 *   "SELECT * INTO {memory:east} FROM {json:sales.json} WHERE region = 'east';",
 * );
 * ```
 *
 * ## Core Concepts
 *
 * - **Relation**: ordered named columns plus ordered rows
 * - **Plan**: the tagged step list a statement lowers to
 * - **Adapter**: extracts and loads relations for one source type
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core';

// ═══════════════════════════════════════════════════════════════════════════════
// ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from './adapters';

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONAL OPERATORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from './internals';

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from './errors';

// Query language
export * from './sql';
