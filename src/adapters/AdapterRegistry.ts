/**
 * Adapter Registry
 * ================
 *
 * Routes extract and load calls to the adapter registered for a source
 * type. Adapter failures are wrapped with the offending `type:path`.
 *
 * @module
 */

import { ExtractFailedError, LoadFailedError, UnknownSourceTypeError } from '../errors';
import type { Relation } from '../internals/relation';
import type { LoadOptions, SourceAdapter } from './types';

export class AdapterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();

  constructor(adapters: readonly SourceAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /** Register an adapter, replacing any previous one for the same type */
  register(adapter: SourceAdapter): this {
    this.adapters.set(adapter.sourceType.toLowerCase(), adapter);
    return this;
  }

  has(sourceType: string): boolean {
    return this.adapters.has(sourceType.toLowerCase());
  }

  get sourceTypes(): string[] {
    return Array.from(this.adapters.keys()).sort();
  }

  get(sourceType: string): SourceAdapter {
    const adapter = this.adapters.get(sourceType.toLowerCase());
    if (!adapter) {
      throw new UnknownSourceTypeError(sourceType, this.sourceTypes);
    }
    return adapter;
  }

  async extract(sourceType: string, path: string): Promise<Relation> {
    const adapter = this.get(sourceType);
    try {
      return await adapter.extract(path);
    } catch (err) {
      throw new ExtractFailedError(sourceType, path, err);
    }
  }

  async load(
    relation: Relation,
    sourceType: string,
    destination: string,
    options: LoadOptions = { mode: 'replace' },
  ): Promise<void> {
    const adapter = this.get(sourceType);
    if (!adapter.load) {
      throw new LoadFailedError(sourceType, destination, new Error(`source type '${sourceType}' is read-only`));
    }
    try {
      await adapter.load(relation, destination, options);
    } catch (err) {
      throw new LoadFailedError(sourceType, destination, err);
    }
  }
}
