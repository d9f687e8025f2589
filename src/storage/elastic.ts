// Индекс сегментов поверх Elasticsearch.
import { Client, errors } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import type { ElasticsearchConfig } from '../config/schema.js';
import { ClientManager } from './connection.js';
import { buildIndexMappings } from './schema.js';
import type { SegmentDocument } from './schema.js';
import type {
  BulkItem,
  BulkResult,
  IndexHit,
  IndexInfo,
  IndexQuery,
  IndexSearchRequest,
  IndexSearchResult,
  SegmentIndex,
} from './types.js';

// Сколько причин ошибок bulk сохранять для вывода.
const MAX_REPORTED_BULK_ERRORS = 5;

// Создаёт клиент Elasticsearch по конфигурации.
export function createElasticClient(config: ElasticsearchConfig): Client {
  let auth: { apiKey: string } | { username: string; password: string } | undefined;
  if (config.apiKey) {
    auth = { apiKey: config.apiKey };
  } else if (config.username && config.password) {
    auth = { username: config.username, password: config.password };
  }

  return new Client({
    node: config.node,
    auth,
    requestTimeout: config.requestTimeoutMs,
    // Повторы делает только оркестратор поиска, один раз и в более простом режиме.
    maxRetries: 0,
  });
}

// Менеджер одного клиента на процесс; перед заменой новый клиент проверяется ping.
export function createClientManager(config: ElasticsearchConfig): ClientManager<Client> {
  return new ClientManager<Client>({
    create: () => createElasticClient(config),
    probe: async (client) => {
      await client.ping();
    },
    dispose: (client) => client.close(),
  });
}

function isConnectionFailure(error: unknown): boolean {
  return error instanceof errors.ConnectionError || error instanceof errors.NoLivingConnectionsError;
}

function totalOf(total: number | estypes.SearchTotalHits | undefined, fallback: number): number {
  if (typeof total === 'number') {
    return total;
  }
  return total?.value ?? fallback;
}

function toIndexHit(hit: estypes.SearchHit<SegmentDocument>): IndexHit {
  return {
    id: hit._id ?? '',
    score: hit._score ?? null,
    source: hit._source,
  };
}

export class ElasticSegmentIndex implements SegmentIndex {
  constructor(
    private clients: ClientManager<Client>,
    readonly indexName: string,
    private requestTimeoutMs: number,
  ) {}

  // Таймаут одного вызова; signal прерывает его по запросу вызывающего.
  private requestOptions(signal?: AbortSignal): { requestTimeout: number; signal?: AbortSignal } {
    return { requestTimeout: this.requestTimeoutMs, signal };
  }

  async search(request: IndexSearchRequest): Promise<IndexSearchResult> {
    const response = await this.withClient((client) => client.search<SegmentDocument>({
      index: this.indexName,
      query: request.query,
      size: request.size,
      sort: request.sort,
      _source_excludes: ['vector'],
    }, this.requestOptions(request.signal)));

    const hits = response.hits.hits.map(toIndexHit);
    return { hits, total: totalOf(response.hits.total, hits.length) };
  }

  async count(query: IndexQuery, signal?: AbortSignal): Promise<number> {
    const response = await this.withClient((client) => client.count({
      index: this.indexName,
      query,
    }, this.requestOptions(signal)));

    return response.count;
  }

  async exists(): Promise<boolean> {
    return this.withClient((client) => client.indices.exists({ index: this.indexName }, this.requestOptions()));
  }

  async bulk(items: BulkItem[]): Promise<BulkResult> {
    if (items.length === 0) {
      return { indexed: 0, failed: 0, errors: [] };
    }

    const operations = items.flatMap((item) => [
      { index: { _index: this.indexName, _id: item.id } },
      item.document,
    ]);
    const response = await this.withClient((client) => client.bulk({ operations }, this.requestOptions()));

    let failed = 0;
    const reasons: string[] = [];
    for (const item of response.items) {
      const error = item.index?.error;
      if (error) {
        failed++;
        if (reasons.length < MAX_REPORTED_BULK_ERRORS) {
          reasons.push(`${item.index?._id ?? '?'}: ${error.reason ?? error.type}`);
        }
      }
    }

    return { indexed: items.length - failed, failed, errors: reasons };
  }

  async ping(): Promise<boolean> {
    try {
      return await this.withClient((client) => client.ping(undefined, this.requestOptions()));
    } catch (error) {
      console.error('[storage] Ping failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  async info(): Promise<IndexInfo> {
    const response = await this.withClient((client) => client.info(undefined, this.requestOptions()));
    return { clusterName: response.cluster_name, version: response.version.number };
  }

  async createIndex(dimensions: number): Promise<boolean> {
    if (await this.exists()) {
      return false;
    }

    const { settings, mappings } = buildIndexMappings(dimensions);
    await this.withClient((client) => client.indices.create({
      index: this.indexName,
      settings,
      mappings,
    }, this.requestOptions()));
    return true;
  }

  async refresh(): Promise<void> {
    await this.withClient((client) => client.indices.refresh({ index: this.indexName }, this.requestOptions()));
  }

  async *scan(batchSize: number): AsyncIterable<IndexHit[]> {
    const client = this.clients.get();
    const scroll = client.helpers.scrollSearch<SegmentDocument>({
      index: this.indexName,
      query: { match_all: {} },
      size: batchSize,
    }, this.requestOptions());

    for await (const page of scroll) {
      yield page.body.hits.hits.map(toIndexHit);
    }
  }

  // Выполняет операцию; при потере соединения пересоздаёт клиент и пробрасывает ошибку.
  private async withClient<R>(operation: (client: Client) => Promise<R>): Promise<R> {
    const client = this.clients.get();
    try {
      return await operation(client);
    } catch (error) {
      if (isConnectionFailure(error)) {
        await this.reconnectAfter(client);
      }
      throw error;
    }
  }

  private async reconnectAfter(stale: Client): Promise<void> {
    try {
      await this.clients.reconnect(stale);
    } catch (reconnectError) {
      console.warn(
        '[storage] Reconnect failed:',
        reconnectError instanceof Error ? reconnectError.message : reconnectError,
      );
    }
  }
}

// Открытый индекс вместе с владельцем клиента.
export interface OpenedSegmentIndex {
  index: ElasticSegmentIndex;
  clients: ClientManager<Client>;
}

export function openSegmentIndex(config: ElasticsearchConfig): OpenedSegmentIndex {
  const clients = createClientManager(config);
  const index = new ElasticSegmentIndex(clients, config.index, config.requestTimeoutMs);
  return { index, clients };
}

export async function closeSegmentIndex(opened: OpenedSegmentIndex): Promise<void> {
  await opened.clients.close();
}
