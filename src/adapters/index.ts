export { AdapterRegistry } from './AdapterRegistry';
export { MemoryAdapter } from './MemoryAdapter';
export { JsonFileAdapter, toRecords, type JsonFileAdapterOptions } from './JsonFileAdapter';
export { RemoteAdapter, type RemoteCollector } from './RemoteAdapter';
export type { LoadMode, LoadOptions, SourceAdapter } from './types';
