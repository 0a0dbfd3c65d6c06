import type { GeoPoint, PropertyFilter, PropertyTableColumn, Sort } from '../types.js';
import { PROPERTY_TABLE_COLUMNS } from '../types.js';
import { FACET_FIELDS } from './schema.js';
import type { FacetField, FilterableField, GeoField, SortableField } from './schema.js';

export const PAGE_SIZE = 20;

export type FilterClause =
  | { kind: 'equals'; field: FilterableField; value: string }
  | { kind: 'geoDistance'; field: GeoField; center: GeoPoint; maxDistance: number };

export interface SortClause {
  field: SortableField;
  direction: 'asc' | 'desc';
}

/**
 * Backend-neutral description of one search. `filters` is a conjunction;
 * backends must never OR its clauses together.
 */
export interface SearchQuery {
  searchText: string;
  filters: FilterClause[];
  orderBy: SortClause[];
  facets: FacetField[];
  skip: number;
  top: number;
  includeTotalCount: boolean;
}

export function emptyQuery(): SearchQuery {
  return {
    searchText: '',
    filters: [],
    orderBy: [],
    facets: [],
    skip: 0,
    top: PAGE_SIZE,
    includeTotalCount: false
  };
}

export function findByDistance(center: GeoPoint, maxDistance: number): SearchQuery {
  return {
    ...emptyQuery(),
    filters: [{ kind: 'geoDistance', field: '_geo', center, maxDistance }]
  };
}

// Filter values are compared upper-cased; ingestion keeps the register of the
// source data, which is upper case for every filterable field.
export function withFilter(query: SearchQuery, field: FilterableField, value: string | undefined): SearchQuery {
  if (value === undefined) return query;
  return {
    ...query,
    filters: [...query.filters, { kind: 'equals', field, value: value.toUpperCase() }]
  };
}

export function applyFilters(query: SearchQuery, filter: PropertyFilter): SearchQuery {
  const pairs: Array<[FilterableField, string | undefined]> = [
    ['town', filter.town],
    ['county', filter.county],
    ['locality', filter.locality],
    ['district', filter.district]
  ];
  return pairs.reduce((acc, [field, value]) => withFilter(acc, field, value), query);
}

export function parseColumn(column: string): PropertyTableColumn | undefined {
  const normalized = column.trim().toLowerCase();
  return PROPERTY_TABLE_COLUMNS.find((c) => c === normalized);
}

export function toSearchColumns(column: string): SortableField[] {
  switch (parseColumn(column)) {
    case 'street':
      return ['building', 'street'];
    case 'town':
      return ['town'];
    case 'postcode':
      return ['postcode'];
    case 'date':
      return ['dateOfTransfer'];
    case 'price':
      return ['price'];
    case undefined:
      return [];
  }
}

export function orderBy(query: SearchQuery, sort: Sort): SearchQuery {
  if (sort.sortColumn === undefined) return query;
  const direction = sort.sortDirection === 'descending' ? 'desc' : 'asc';
  return {
    ...query,
    orderBy: toSearchColumns(sort.sortColumn).map((field) => ({ field, direction }))
  };
}

export function toSearchText(text: string | undefined): string {
  return text ? `${text}*` : '';
}

/** Fixes the page window, the free text and the facet breakdowns. */
export function forPage(query: SearchQuery, page: number, text: string | undefined): SearchQuery {
  return {
    ...query,
    searchText: toSearchText(text),
    facets: [...FACET_FIELDS],
    skip: page * PAGE_SIZE,
    top: PAGE_SIZE,
    includeTotalCount: true
  };
}
