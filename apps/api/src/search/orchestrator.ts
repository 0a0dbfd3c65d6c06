import { DataIntegrityError } from '../errors.js';
import { createLogger } from '../logger.js';
import type {
  FindByPostcodeRequest,
  FindGenericRequest,
  FindPropertiesResponse,
  SuggestRequest,
  SuggestionResponse
} from '../types.js';
import type { Geocoder, SearchBackend } from './backend.js';
import { splitPostcode } from './postcode.js';
import { applyFilters, emptyQuery, findByDistance, forPage, orderBy, type SearchQuery } from './queryBuilder.js';
import { emptyResponse, toFindPropertiesResponse } from './resultProjector.js';

const logger = createLogger('search');

export const MAX_SUGGESTIONS = 10;

async function execute(backend: SearchBackend, query: SearchQuery, page: number): Promise<FindPropertiesResponse> {
  const searchPage = await backend.search(query);
  const projected = toFindPropertiesResponse(searchPage, page);
  if (!projected.ok) throw new DataIntegrityError(projected.error);
  return projected.value;
}

export async function findGeneric(backend: SearchBackend, request: FindGenericRequest): Promise<FindPropertiesResponse> {
  const query = forPage(orderBy(applyFilters(emptyQuery(), request.filter), request.sort), request.page, request.text);
  return execute(backend, query, request.page);
}

/**
 * Radius search around a postcode. A postcode that does not split into
 * outward and inward codes, or that the geocoder cannot place, is a user
 * input problem: the caller gets an empty page, never an error.
 */
export async function findByPostcode(
  backend: SearchBackend,
  geocoder: Geocoder,
  request: FindByPostcodeRequest
): Promise<FindPropertiesResponse> {
  const parts = splitPostcode(request.postcode);
  if (!parts) {
    logger.debug({ postcode: request.postcode }, 'postcode not in outward/inward form');
    return emptyResponse(request.page);
  }

  const geo = await geocoder.tryGetGeo(...parts);
  if (!geo) {
    logger.debug({ postcode: request.postcode }, 'postcode could not be geocoded');
    return emptyResponse(request.page);
  }

  const query = forPage(
    orderBy(applyFilters(findByDistance(geo, request.maxDistance), request.filter), request.sort),
    request.page,
    undefined
  );
  return execute(backend, query, request.page);
}

export async function suggest(backend: SearchBackend, request: SuggestRequest): Promise<SuggestionResponse> {
  const raw = await backend.suggest(request.text, MAX_SUGGESTIONS);
  const suggestions = [...new Set(raw)].slice(0, MAX_SUGGESTIONS);
  return { suggestions };
}
