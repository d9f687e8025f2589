// Состояние кластера и индекса для команды status и MCP-инструмента.
import type { SegmentIndex } from './types.js';

export type IndexStatus =
  | { connected: false; index: string }
  | {
    connected: true;
    clusterName: string;
    version: string;
    index: string;
    exists: boolean;
    documents: number | null;
  };

export async function getIndexStatus(index: SegmentIndex): Promise<IndexStatus> {
  if (!(await index.ping())) {
    return { connected: false, index: index.indexName };
  }

  const [info, exists] = await Promise.all([index.info(), index.exists()]);
  const documents = exists ? await index.count({ match_all: {} }) : null;

  return {
    connected: true,
    clusterName: info.clusterName,
    version: info.version,
    index: index.indexName,
    exists,
    documents,
  };
}
