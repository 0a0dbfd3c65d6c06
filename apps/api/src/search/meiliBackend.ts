import { MeiliSearch, type Index, type SearchParams, type Settings } from 'meilisearch';
import { createLogger } from '../logger.js';
import { DEFAULT_MAX_TOTAL_HITS, type FacetBucket, type SearchBackend, type SearchPage } from './backend.js';
import type { FilterClause, SearchQuery, SortClause } from './queryBuilder.js';
import { FACET_FIELDS, PRIMARY_KEY, SUGGESTER_FIELDS, fieldsWith } from './schema.js';
import type { FacetField, SearchDocument } from './schema.js';

const logger = createLogger('meili');

export interface MeiliConfig {
  host: string;
  apiKey: string;
  indexName: string;
  timeoutMs: number;
  // How long index writes are awaited before the request gives up.
  taskTimeoutMs: number;
  maxTotalHits: number;
}

export type MeiliIndexOptions = Pick<MeiliConfig, 'indexName' | 'taskTimeoutMs' | 'maxTotalHits'>;

// `page` + `hitsPerPage` makes Meilisearch count matches, up to `maxTotalHits`, instead of estimating.
export type MeiliPageParams = SearchParams & { page: number; hitsPerPage: number };

export function escapeFilterValue(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function toMeiliClause(clause: FilterClause): string {
  switch (clause.kind) {
    case 'equals':
      return `${clause.field} = "${escapeFilterValue(clause.value)}"`;
    case 'geoDistance': {
      const meters = Math.round(clause.maxDistance * 1000);
      return `_geoRadius(${clause.center.lat}, ${clause.center.lng}, ${meters})`;
    }
  }
}

export function toMeiliFilter(filters: FilterClause[]): string | undefined {
  return filters.length ? filters.map(toMeiliClause).join(' AND ') : undefined;
}

export function toMeiliSort(orderBy: SortClause[]): string[] | undefined {
  return orderBy.length ? orderBy.map((s) => `${s.field}:${s.direction}`) : undefined;
}

export function toMeiliSearchParams(query: SearchQuery): MeiliPageParams {
  const top = Math.max(query.top, 1);
  return {
    filter: toMeiliFilter(query.filters),
    sort: toMeiliSort(query.orderBy),
    facets: query.facets.length ? [...query.facets] : undefined,
    page: Math.floor(query.skip / top) + 1,
    hitsPerPage: top
  };
}

export function toFacetBuckets(
  distribution: Record<string, Record<string, number>> | undefined
): Partial<Record<FacetField, FacetBucket[]>> {
  const facets: Partial<Record<FacetField, FacetBucket[]>> = {};
  if (!distribution) return facets;
  for (const field of FACET_FIELDS) {
    const values = distribution[field];
    if (!values) continue;
    facets[field] = Object.entries(values).map(([value, count]) => ({ value, count }));
  }
  return facets;
}

/**
 * Exact match count, or undefined when Meilisearch stopped counting at the
 * `maxTotalHits` cap and the figure is only a lower bound.
 */
export function readTotal(
  res: { totalHits?: number; estimatedTotalHits?: number },
  maxTotalHits: number
): number | undefined {
  const total = res.totalHits ?? res.estimatedTotalHits;
  if (total === undefined || total >= maxTotalHits) return undefined;
  return total;
}

export function indexSettings(maxTotalHits: number = DEFAULT_MAX_TOTAL_HITS): Settings {
  const filterable = new Set<string>([...fieldsWith('filterable'), ...fieldsWith('facetable')]);
  return {
    searchableAttributes: fieldsWith('searchable'),
    filterableAttributes: [...filterable],
    sortableAttributes: fieldsWith('sortable'),
    faceting: { maxValuesPerFacet: 100 },
    pagination: { maxTotalHits }
  };
}

export class MeiliSearchBackend implements SearchBackend {
  constructor(
    private readonly client: MeiliSearch,
    private readonly options: MeiliIndexOptions
  ) {}

  private idx(): Index<SearchDocument> {
    return this.client.index<SearchDocument>(this.options.indexName);
  }

  private waitFor(taskUid: number) {
    return this.client.waitForTask(taskUid, { timeOutMs: this.options.taskTimeoutMs });
  }

  private async settle(taskUid: number, what: string): Promise<void> {
    const task = await this.waitFor(taskUid);
    if (task.status !== 'succeeded') {
      throw new Error(`${what} failed (${task.status}): ${task.error?.message ?? 'no detail'}`);
    }
  }

  async search(query: SearchQuery): Promise<SearchPage> {
    const res = await this.idx().search(query.searchText, toMeiliSearchParams(query));
    const page: SearchPage = {
      documents: res.hits,
      facets: toFacetBuckets(res.facetDistribution)
    };
    if (query.includeTotalCount) {
      const total = readTotal(res, this.options.maxTotalHits);
      if (total === undefined) logger.debug({ maxTotalHits: this.options.maxTotalHits }, 'match count capped');
      else page.count = total;
    }
    return page;
  }

  // Meilisearch has no suggester; a prefix search restricted to the suggester
  // fields stands in, and each hit yields the text of its first matched field.
  async suggest(text: string, top: number): Promise<string[]> {
    const res = await this.idx().search(text, {
      limit: top,
      attributesToSearchOn: [...SUGGESTER_FIELDS],
      attributesToRetrieve: [...SUGGESTER_FIELDS],
      showMatchesPosition: true
    });

    const suggestions: string[] = [];
    for (const hit of res.hits) {
      const field = SUGGESTER_FIELDS.find((f) => (hit._matchesPosition?.[f]?.length ?? 0) > 0);
      const value = field ? hit[field] : undefined;
      if (typeof value === 'string' && value.length > 0) suggestions.push(value);
    }
    return suggestions;
  }

  async upsert(documents: SearchDocument[]): Promise<void> {
    if (!documents.length) return;
    const task = await this.idx().addDocuments(documents, { primaryKey: PRIMARY_KEY });
    await this.settle(task.taskUid, 'Document upload');
  }

  async recreateIndex(): Promise<void> {
    // A missing index only fails the deletion task, which waitForTask reports without throwing.
    const { indexName, maxTotalHits } = this.options;
    const removed = await this.client.deleteIndex(indexName);
    await this.waitFor(removed.taskUid);
    const created = await this.client.createIndex(indexName, { primaryKey: PRIMARY_KEY });
    await this.settle(created.taskUid, 'Index creation');
    const settings = await this.idx().updateSettings(indexSettings(maxTotalHits));
    await this.settle(settings.taskUid, 'Index settings update');
    logger.info({ index: indexName, maxTotalHits }, 'search index recreated');
  }
}

export function meiliConfigKey(config: MeiliConfig): string {
  const { host, apiKey, indexName, timeoutMs, taskTimeoutMs, maxTotalHits } = config;
  return [host, apiKey, indexName, timeoutMs, taskTimeoutMs, maxTotalHits].join('|');
}

export function createMeiliBackend(config: MeiliConfig): MeiliSearchBackend {
  const client = new MeiliSearch({ host: config.host, apiKey: config.apiKey, timeout: config.timeoutMs });
  return new MeiliSearchBackend(client, {
    indexName: config.indexName,
    taskTimeoutMs: config.taskTimeoutMs,
    maxTotalHits: config.maxTotalHits
  });
}
