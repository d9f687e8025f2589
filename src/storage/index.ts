// Barrel-файл модуля хранения.
export type { SegmentDocument, Segment } from './schema.js';
export {
  SEGMENT_FIELDS,
  buildIndexMappings,
  segmentFromSource,
  segmentToDocument,
  sourceHasVector,
} from './schema.js';

export type {
  SegmentIndex,
  IndexQuery,
  IndexHit,
  IndexSearchRequest,
  IndexSearchResult,
  BulkItem,
  BulkResult,
  IndexInfo,
} from './types.js';

export type { ClientLifecycle } from './connection.js';
export { ClientManager } from './connection.js';

export type { OpenedSegmentIndex } from './elastic.js';
export {
  ElasticSegmentIndex,
  createElasticClient,
  createClientManager,
  openSegmentIndex,
  closeSegmentIndex,
} from './elastic.js';

export type { IndexStatus } from './status.js';
export { getIndexStatus } from './status.js';
