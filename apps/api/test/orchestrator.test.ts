import { describe, expect, it } from 'vitest';
import { DataIntegrityError } from '../src/errors.js';
import { findByPostcode, findGeneric, suggest } from '../src/search/orchestrator.js';
import type { Geocoder } from '../src/search/backend.js';
import { FakeBackend, FakeGeocoder, buckets, pageOf, propertyRecord, storedDocument } from './fakes.js';

const EMPTY_FACETS = { towns: [], localities: [], districts: [], counties: [], prices: [] };

describe('findGeneric', () => {
  it('sends a prefix query with filters, sort and page window, and projects the page', async () => {
    const backend = new FakeBackend(pageOf([storedDocument()], { locality: buckets('OAKFIELD') }, 21));

    const response = await findGeneric(backend, {
      text: 'Oak',
      filter: { town: 'Exampleton' },
      sort: { sortColumn: 'price', sortDirection: 'descending' },
      page: 1
    });

    expect(backend.queries).toEqual([
      {
        searchText: 'Oak*',
        filters: [{ kind: 'equals', field: 'town', value: 'EXAMPLETON' }],
        orderBy: [{ field: 'price', direction: 'desc' }],
        facets: ['town', 'locality', 'district', 'county', 'price'],
        skip: 20,
        top: 20,
        includeTotalCount: true
      }
    ]);
    expect(response).toEqual({
      results: [propertyRecord()],
      totalTransactions: 21,
      facets: { ...EMPTY_FACETS, localities: ['OAKFIELD'] },
      page: 1
    });
  });

  it('sends an empty string when there is no text', async () => {
    const backend = new FakeBackend();
    await findGeneric(backend, { filter: {}, sort: {}, page: 0 });
    expect(backend.queries[0]?.searchText).toBe('');
  });

  it('raises a data integrity error for documents the domain cannot read', async () => {
    const backend = new FakeBackend(pageOf([storedDocument({ contract: 'Commonhold' })]));

    const search = findGeneric(backend, { filter: {}, sort: {}, page: 0 });
    await expect(search).rejects.toBeInstanceOf(DataIntegrityError);
    await expect(search).rejects.toMatchObject({ kind: 'UnknownEnumerationValue', field: 'contract' });
  });

  it('propagates backend failures unchanged', async () => {
    const backend = new FakeBackend();
    const failure = new Error('search service unavailable');
    backend.failWith = failure;

    await expect(findGeneric(backend, { filter: {}, sort: {}, page: 0 })).rejects.toBe(failure);
  });
});

describe('findByPostcode', () => {
  // The empty page for unusable postcodes is intended behaviour; it must not become an error.
  it('returns an empty page for a postcode that is not two parts', async () => {
    const backend = new FakeBackend(pageOf([storedDocument()], {}, 1));
    const geocoder = new FakeGeocoder({ 'ZZ9 9ZZ': { lat: 1, lng: 1 } });

    const response = await findByPostcode(backend, geocoder, {
      postcode: 'ZZ9',
      maxDistance: 2,
      filter: {},
      sort: {},
      page: 0
    });

    expect(response).toEqual({ results: [], facets: EMPTY_FACETS, page: 0 });
    expect(response.totalTransactions).toBeUndefined();
    expect(geocoder.calls).toEqual([]);
    expect(backend.queries).toEqual([]);
  });

  it('returns an empty page when the postcode cannot be geocoded', async () => {
    const backend = new FakeBackend(pageOf([storedDocument()], {}, 1));
    const geocoder = new FakeGeocoder();

    const response = await findByPostcode(backend, geocoder, {
      postcode: 'QQ1 1QQ',
      maxDistance: 2,
      filter: { county: 'kent' },
      sort: {},
      page: 4
    });

    expect(response).toEqual({ results: [], facets: EMPTY_FACETS, page: 4 });
    expect(geocoder.calls).toEqual([['QQ1', '1QQ']]);
    expect(backend.queries).toEqual([]);
  });

  it('searches around the geocoded point with no free text', async () => {
    const backend = new FakeBackend(pageOf([storedDocument()], { price: buckets(250000) }, 1));
    const geocoder = new FakeGeocoder({ 'AB1 2CD': { lat: 57.1, lng: -2.1 } });

    const response = await findByPostcode(backend, geocoder, {
      postcode: 'AB1 2CD',
      maxDistance: 3,
      filter: { district: 'example district' },
      sort: { sortColumn: 'date' },
      page: 0
    });

    expect(backend.queries).toEqual([
      {
        searchText: '',
        filters: [
          { kind: 'geoDistance', field: '_geo', center: { lat: 57.1, lng: -2.1 }, maxDistance: 3 },
          { kind: 'equals', field: 'district', value: 'EXAMPLE DISTRICT' }
        ],
        orderBy: [{ field: 'dateOfTransfer', direction: 'asc' }],
        facets: ['town', 'locality', 'district', 'county', 'price'],
        skip: 0,
        top: 20,
        includeTotalCount: true
      }
    ]);
    expect(response).toEqual({
      results: [propertyRecord()],
      totalTransactions: 1,
      facets: { ...EMPTY_FACETS, prices: ['250000'] },
      page: 0
    });
  });

  it('propagates geocoder failures', async () => {
    const failing: Geocoder = {
      tryGetGeo: async () => {
        throw new Error('lookup timed out');
      }
    };

    await expect(
      findByPostcode(new FakeBackend(), failing, { postcode: 'AB1 2CD', maxDistance: 1, filter: {}, sort: {}, page: 0 })
    ).rejects.toThrow('lookup timed out');
  });
});

describe('suggest', () => {
  it('asks for ten suggestions and removes duplicates in first-seen order', async () => {
    const backend = new FakeBackend(undefined, ['OAKHAM', 'OAK ROAD', 'OAKHAM', 'OAKFIELD', 'OAK ROAD']);

    const response = await suggest(backend, { text: 'oak' });

    expect(backend.suggestCalls).toEqual([{ text: 'oak', top: 10 }]);
    expect(response).toEqual({ suggestions: ['OAKHAM', 'OAK ROAD', 'OAKFIELD'] });
  });

  it('never returns more than ten entries', async () => {
    const many = Array.from({ length: 14 }, (_, i) => `PLACE ${i}`);
    const backend = new FakeBackend(undefined, many);

    const response = await suggest(backend, { text: 'pl' });

    expect(response.suggestions).toEqual(many.slice(0, 10));
  });
});
