// Контракт индекса сегментов.
import type { estypes } from '@elastic/elasticsearch';
import type { SegmentDocument } from './schema.js';

export type IndexQuery = estypes.QueryDslQueryContainer;

// Документ из выдачи индекса.
export interface IndexHit {
  // _id документа в индексе.
  id: string;
  score: number | null;
  source: unknown;
}

export interface IndexSearchRequest {
  query: IndexQuery;
  size: number;
  sort?: estypes.Sort;
  signal?: AbortSignal;
}

export interface IndexSearchResult {
  hits: IndexHit[];
  // Число совпадений по оценке индекса (может быть нижней границей).
  total: number;
}

export interface BulkItem {
  id: string;
  document: SegmentDocument;
}

export interface BulkResult {
  indexed: number;
  failed: number;
  // Причины первых ошибок, для вывода пользователю.
  errors: string[];
}

export interface IndexInfo {
  clusterName: string;
  version: string;
}

// Индекс сегментов транскриптов.
export interface SegmentIndex {
  readonly indexName: string;

  search(request: IndexSearchRequest): Promise<IndexSearchResult>;
  count(query: IndexQuery, signal?: AbortSignal): Promise<number>;
  exists(): Promise<boolean>;
  bulk(items: BulkItem[]): Promise<BulkResult>;
  ping(): Promise<boolean>;
  info(): Promise<IndexInfo>;

  // Создаёт индекс. false, если индекс уже существовал.
  createIndex(dimensions: number): Promise<boolean>;
  refresh(): Promise<void>;
  // Обходит все документы пачками (scroll).
  scan(batchSize: number): AsyncIterable<IndexHit[]>;
}
