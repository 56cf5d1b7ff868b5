import type {
  IndexBatchItem,
  SimilaritySearch,
} from './interfaces/similarity-search/similarity-search.interface';

/**
 * Sequential batch indexing shared by the backends: no rollback across the
 * batch, the first failure aborts the rest.
 */
export async function indexInOrder(
  search: Pick<SimilaritySearch, 'indexVector'>,
  batch: IndexBatchItem[],
): Promise<void> {
  for (const item of batch) {
    await search.indexVector(item.vector, item.metadata);
  }
}
