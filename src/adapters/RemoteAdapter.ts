/**
 * Remote earth-observation sources (`{gee:project|dataset|start|end|lon|lat|scale}`).
 *
 * The adapter validates the descriptor and hands it to a collector that
 * talks to the remote service. Read-only.
 */

import type { RemoteDescriptor } from '../sql/ast-types';
import { parseRemoteDescriptor } from '../sql/parser';
import { Relation, type RecordRow } from '../internals/relation';
import type { SourceAdapter } from './types';

export interface RemoteCollector {
  collect(descriptor: RemoteDescriptor): Promise<Relation | readonly RecordRow[]>;
}

export class RemoteAdapter implements SourceAdapter {
  constructor(
    private readonly collector: RemoteCollector,
    readonly sourceType = 'gee',
  ) {}

  async extract(path: string): Promise<Relation> {
    const descriptor = parseRemoteDescriptor(path);
    if (typeof descriptor === 'string') {
      throw new Error(`invalid remote descriptor: ${descriptor}`);
    }
    const collected = await this.collector.collect(descriptor);
    return collected instanceof Relation ? collected : Relation.fromRecords(collected);
  }
}
