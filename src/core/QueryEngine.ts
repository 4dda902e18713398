/**
 * QueryEngine - parse, plan and execute query text
 * ================================================
 *
 * ## Usage
 *
 * ```ts
 * import { QueryEngine, MemoryAdapter } from 'terraql';
 *
 * const memory = new MemoryAdapter({
 *   sales: [
 *     { region: 'east', amount: 10 },
 *     { region: 'west', amount: 5 },
 *   ],
 * });
 * const engine = new QueryEngine({ adapters: [memory] });
 *
 * const totals = await engine.execute('SELECT region, sum(amount) FROM sales GROUP BY region;');
 * console.log(totals.toRecords());
 * ```
 */

import type { Statement } from '../sql/ast-types';
import { QueryParser } from '../sql/parser';
import { planStatement, type Plan } from '../sql/planner';
import type { Relation } from '../internals/relation';
import { AdapterRegistry } from '../adapters/AdapterRegistry';
import { MemoryAdapter } from '../adapters/MemoryAdapter';
import type { SourceAdapter } from '../adapters/types';
import { executePlan } from './executor';

export interface QueryEngineOptions {
  /** Registry or adapters to register; defaults to a single empty MemoryAdapter */
  adapters?: AdapterRegistry | readonly SourceAdapter[];
  /** Enable debug logging */
  debug?: boolean;
}

export interface CompiledQuery {
  statement: Statement;
  plan: Plan;
}

export class QueryEngine {
  readonly adapters: AdapterRegistry;
  private readonly parser = new QueryParser();
  private readonly debug: boolean;

  constructor(options: QueryEngineOptions = {}) {
    const { adapters = [new MemoryAdapter()], debug = false } = options;
    this.adapters = adapters instanceof AdapterRegistry ? adapters : new AdapterRegistry(adapters);
    this.debug = debug;
  }

  /** Parse and plan without touching any adapter */
  compile(text: string): CompiledQuery {
    const statement = this.parser.parse(text);
    const plan = planStatement(statement);
    if (this.debug) {
      console.log('[QueryEngine] Compiled plan:', plan.steps.map(step => step.id).join(' -> '));
    }
    return { statement, plan };
  }

  async execute(text: string): Promise<Relation> {
    return this.executePlan(this.compile(text).plan);
  }

  executePlan(plan: Plan): Promise<Relation> {
    return executePlan(plan, this.adapters, { debug: this.debug });
  }
}
