import { createLogger } from '../logger.js';
import type { GeoPoint, IngestionSummary, PropertyResult } from '../types.js';
import type { Geocoder, SearchBackend } from './backend.js';
import { splitPostcode } from './postcode.js';
import type { SearchDocument } from './schema.js';

const logger = createLogger('ingestion');

export function toSearchDocument(record: PropertyResult, geo?: GeoPoint): SearchDocument {
  const { address, buildDetails } = record;
  const doc: SearchDocument = {
    transactionId: String(record.transactionId),
    price: record.price,
    dateOfTransfer: record.dateOfTransfer,
    build: String(buildDetails.build),
    contract: String(buildDetails.contract),
    building: address.building,
    town: address.townCity,
    district: address.district,
    county: address.county
  };

  // Absent fields stay off the document.
  if (buildDetails.propertyType !== undefined) doc.propertyType = String(buildDetails.propertyType);
  if (address.postcode !== undefined) doc.postcode = address.postcode;
  if (address.street !== undefined) doc.street = address.street;
  if (address.locality !== undefined) doc.locality = address.locality;
  if (geo) doc._geo = { lat: geo.lat, lng: geo.lng };

  return doc;
}

async function geocodeAll(geocoder: Geocoder, records: PropertyResult[]): Promise<Map<string, GeoPoint>> {
  const located = new Map<string, GeoPoint>();
  const seen = new Set<string>();

  for (const record of records) {
    const postcode = record.address.postcode;
    if (postcode === undefined || seen.has(postcode)) continue;
    seen.add(postcode);

    const parts = splitPostcode(postcode);
    if (!parts) continue;
    const geo = await geocoder.tryGetGeo(...parts);
    if (geo) located.set(postcode, geo);
  }

  return located;
}

/**
 * Maps the records into search documents and uploads them as one
 * replace-by-identifier batch. Records whose postcode cannot be placed are
 * indexed without a coordinate.
 */
export async function insertProperties(
  backend: SearchBackend,
  geocoder: Geocoder,
  records: PropertyResult[]
): Promise<IngestionSummary> {
  const located = await geocodeAll(geocoder, records);

  let withoutGeo = 0;
  const documents = records.map((record) => {
    const postcode = record.address.postcode;
    const geo = postcode === undefined ? undefined : located.get(postcode);
    if (!geo) withoutGeo++;
    return toSearchDocument(record, geo);
  });

  await backend.upsert(documents);
  logger.info({ submitted: documents.length, withoutGeo }, 'uploaded property batch');
  return { submitted: documents.length, withoutGeo };
}
