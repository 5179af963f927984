export { EnrichConfig } from './config';
export { ENRICH_INDEX_NAME_BASE, getEnrichIndexBaseName, PolicyType } from './policy';
export type { EnrichPolicy, PolicyRegistry } from './policy';
export { createEnrichProcessor, enrichProcessorConfigSchema, MAX_MATCHES_LIMIT } from './processor-factory';
export type { CreateEnrichProcessorOptions, EnrichProcessorConfig } from './processor-factory';
export { IngestDocument } from '../document/ingest-document';
export type { EnrichableDocument, FieldValueType } from '../document/ingest-document';
export type { CompletionHandler } from '../engine/completion';
export {
  CompletionError,
  FieldNotFoundError,
  FieldPathError,
  FieldTypeMismatchError,
  IndexNotFoundError,
  UnsupportedOperationError,
} from '../engine/errors';
export { MatchProcessor } from '../engine/match-processor';
export type { MatchProcessorOptions } from '../engine/match-processor';
export { AbstractEnrichProcessor, ENRICH_PROCESSOR_TYPE } from '../engine/processor';
export type { Processor } from '../engine/processor';
export { buildMatchQuery } from '../engine/query-builder';
export { createFirestoreSearchRunner } from '../engine/runners/firestore-runner';
export type { FirestoreSearchRunnerOptions } from '../engine/runners/firestore-runner';
export { createMemorySearchRunner } from '../engine/runners/memory-runner';
export type { MemoryIndices } from '../engine/runners/memory-runner';
export { fromAsyncSearch, QueryType } from '../engine/search';
export type { SearchHit, SearchRequest, SearchResponse, SearchRunner } from '../engine/search';
