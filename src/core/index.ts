/**
 * Query Core
 * ==========
 *
 * Plan execution and the `QueryEngine` facade.
 *
 * @module
 */

export { QueryEngine, type QueryEngineOptions, type CompiledQuery } from './QueryEngine';
export { executePlan, type ExecuteOptions } from './executor';
