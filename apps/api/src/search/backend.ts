import type { GeoPoint } from '../types.js';
import type { SearchQuery } from './queryBuilder.js';
import type { FacetField, SearchDocument } from './schema.js';

// Deepest match a search can reach by paging. A backend that stops counting
// here leaves the count off rather than reporting the cap.
export const DEFAULT_MAX_TOTAL_HITS = 100_000;

export interface FacetBucket {
  value: string | number;
  count: number;
}

export interface SearchPage {
  // Raw stored documents; the projector decides whether they are usable.
  documents: Record<string, unknown>[];
  facets: Partial<Record<FacetField, FacetBucket[]>>;
  count?: number;
}

export interface SearchBackend {
  search(query: SearchQuery): Promise<SearchPage>;
  suggest(text: string, top: number): Promise<string[]>;
  upsert(documents: SearchDocument[]): Promise<void>;
  recreateIndex(): Promise<void>;
}

export interface Geocoder {
  tryGetGeo(outward: string, inward: string): Promise<GeoPoint | undefined>;
}
