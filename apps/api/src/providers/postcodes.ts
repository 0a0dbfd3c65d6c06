import { z } from 'zod';
import { getEnv } from '../env.js';
import type { Geocoder } from '../search/backend.js';
import type { GeoPoint } from '../types.js';

const lookupResponseSchema = z.object({
  result: z
    .object({
      latitude: z.number().nullable().optional(),
      longitude: z.number().nullable().optional()
    })
    .nullable()
    .optional()
});

/**
 * Looks a full postcode up against a postcodes.io compatible API.
 * Unknown or terminated postcodes resolve to undefined; transport and server
 * errors are thrown.
 */
export async function tryGetGeo(outward: string, inward: string): Promise<GeoPoint | undefined> {
  const env = getEnv();
  const url = new URL(`/postcodes/${encodeURIComponent(`${outward} ${inward}`)}`, env.POSTCODES_API_BASE_URL);

  const res = await fetch(url, { headers: { Accept: 'application/json' } });
  if (res.status === 404) return undefined;

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new Error(`Postcode lookup failed (${res.status}): ${text}`);
  }

  const parsed = lookupResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`Postcode lookup returned an unexpected payload: ${parsed.error.message}`);
  }

  const lat = parsed.data.result?.latitude;
  const lng = parsed.data.result?.longitude;
  if (typeof lat !== 'number' || typeof lng !== 'number') return undefined;
  return { lat, lng };
}

export const postcodesGeocoder: Geocoder = { tryGetGeo };
