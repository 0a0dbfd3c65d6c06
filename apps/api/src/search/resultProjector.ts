import { z } from 'zod';
import type { DataIntegrityIssue } from '../errors.js';
import { err, ok, type Result } from '../result.js';
import { BUILD_TYPES, CONTRACT_TYPES, PROPERTY_TYPES } from '../types.js';
import type { Facets, FindPropertiesResponse, PropertyResult, PropertyType } from '../types.js';
import type { FacetBucket, SearchPage } from './backend.js';
import type { FacetField } from './schema.js';

type Conversion<T> = Result<T, DataIntegrityIssue>;

const uuidSchema = z.string().uuid();

function malformed(field: string, value: unknown): { ok: false; error: DataIntegrityIssue } {
  return err({ kind: 'MalformedRecord', field, value });
}

/** null, undefined and non-strings all read as "not present". */
export function optionalString(doc: Record<string, unknown>, key: string): string | undefined {
  const v = doc[key];
  return typeof v === 'string' ? v : undefined;
}

export function requireString(doc: Record<string, unknown>, key: string): Conversion<string> {
  const v = doc[key];
  return typeof v === 'string' ? ok(v) : malformed(key, v);
}

export function requireInteger(doc: Record<string, unknown>, key: string): Conversion<number> {
  const v = doc[key];
  return typeof v === 'number' && Number.isInteger(v) ? ok(v) : malformed(key, v);
}

export function parseTransactionId(value: unknown): Conversion<string> {
  const parsed = uuidSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : malformed('transactionId', value);
}

export function parseEnum<T extends string>(field: string, values: readonly T[], value: unknown): Conversion<T> {
  const match = values.find((v) => v === value);
  return match === undefined ? err({ kind: 'UnknownEnumerationValue', field, value }) : ok(match);
}

function parseOptionalPropertyType(value: unknown): Conversion<PropertyType | undefined> {
  if (value === undefined || value === null) return ok(undefined);
  return parseEnum('propertyType', PROPERTY_TYPES, value);
}

export function toPropertyResult(doc: Record<string, unknown>): Conversion<PropertyResult> {
  const transactionId = parseTransactionId(doc.transactionId);
  if (!transactionId.ok) return transactionId;
  const price = requireInteger(doc, 'price');
  if (!price.ok) return price;
  const dateOfTransfer = requireString(doc, 'dateOfTransfer');
  if (!dateOfTransfer.ok) return dateOfTransfer;

  const propertyType = parseOptionalPropertyType(doc.propertyType);
  if (!propertyType.ok) return propertyType;
  const build = parseEnum('build', BUILD_TYPES, doc.build);
  if (!build.ok) return build;
  const contract = parseEnum('contract', CONTRACT_TYPES, doc.contract);
  if (!contract.ok) return contract;

  const building = requireString(doc, 'building');
  if (!building.ok) return building;
  const town = requireString(doc, 'town');
  if (!town.ok) return town;
  const district = requireString(doc, 'district');
  if (!district.ok) return district;
  const county = requireString(doc, 'county');
  if (!county.ok) return county;

  const result: PropertyResult = {
    transactionId: transactionId.value,
    price: price.value,
    dateOfTransfer: dateOfTransfer.value,
    buildDetails: {
      build: build.value,
      contract: contract.value
    },
    address: {
      building: building.value,
      townCity: town.value,
      district: district.value,
      county: county.value
    }
  };

  if (propertyType.value !== undefined) result.buildDetails.propertyType = propertyType.value;
  const street = optionalString(doc, 'street');
  if (street !== undefined) result.address.street = street;
  const locality = optionalString(doc, 'locality');
  if (locality !== undefined) result.address.locality = locality;
  const postcode = optionalString(doc, 'postcode');
  if (postcode !== undefined) result.address.postcode = postcode;

  return ok(result);
}

function facetValues(buckets: FacetBucket[] | undefined): string[] {
  return (buckets ?? []).map((b) => String(b.value));
}

export function toFacets(facets: Partial<Record<FacetField, FacetBucket[]>>): Facets {
  return {
    towns: facetValues(facets.town),
    localities: facetValues(facets.locality),
    districts: facetValues(facets.district),
    counties: facetValues(facets.county),
    prices: facetValues(facets.price)
  };
}

export function emptyResponse(page: number): FindPropertiesResponse {
  return { results: [], facets: toFacets({}), page };
}

export function toFindPropertiesResponse(searchPage: SearchPage, page: number): Conversion<FindPropertiesResponse> {
  const results: PropertyResult[] = [];
  for (const doc of searchPage.documents) {
    const projected = toPropertyResult(doc);
    if (!projected.ok) return projected;
    results.push(projected.value);
  }

  const response: FindPropertiesResponse = { results, facets: toFacets(searchPage.facets), page };
  if (searchPage.count !== undefined) response.totalTransactions = searchPage.count;
  return ok(response);
}
