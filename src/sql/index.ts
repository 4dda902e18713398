/**
 * Query Language Module
 * =====================
 *
 * Tokenizer, parser and plan builder for the query language.
 *
 * ## Quick Start
 *
 * ```ts
 * import { QueryParser, planStatement } from './sql';
 *
 * const statement = new QueryParser().parse('SELECT * FROM sales WHERE amount > 5;');
 * const plan = planStatement(statement);
 * ```
 *
 * @module
 */

// Re-export all AST types
export * from './ast-types';

// Re-export tokenizer
export { tokenize, TokenizerError, KEYWORDS, END_OF_INPUT } from './tokenizer';
export type { Token, TokenType, TokenizerErrorType } from './tokenizer';

// Re-export parser
export { QueryParser, parse, parseRemoteDescriptor, MEMORY_SOURCE_TYPE, REMOTE_SOURCE_TYPES } from './parser';

// Re-export plan builder
export { buildPlan, planStatement } from './planner';
export type {
  Plan,
  PlanStep,
  ExtractStep,
  JoinStep,
  JoinKeyPair,
  TransformStep,
  ValuesStep,
  LoadStep,
} from './planner';
