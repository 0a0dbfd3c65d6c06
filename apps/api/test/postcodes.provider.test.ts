import { afterEach, describe, expect, it, vi } from 'vitest';

process.env.POSTCODES_API_BASE_URL = 'https://postcodes.test';

import { tryGetGeo } from '../src/providers/postcodes.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('postcode geocoder', () => {
  it('looks the full postcode up and returns its coordinate', async () => {
    const fetchMock = vi.fn(async (input: URL | string) => {
      const url = new URL(String(input));
      expect(url.origin).toBe('https://postcodes.test');
      expect(url.pathname).toBe('/postcodes/AB1%202CD');
      return jsonResponse({ status: 200, result: { postcode: 'AB1 2CD', latitude: 57.1, longitude: -2.1 } });
    });
    vi.stubGlobal('fetch', fetchMock);

    await expect(tryGetGeo('AB1', '2CD')).resolves.toEqual({ lat: 57.1, lng: -2.1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('resolves unknown postcodes to no coordinate', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ status: 404, error: 'Postcode not found' }, 404)));

    await expect(tryGetGeo('ZZ9', '9ZZ')).resolves.toBeUndefined();
  });

  it('resolves postcodes without a position to no coordinate', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ status: 200, result: { postcode: 'GY1 1AA', latitude: null, longitude: null } }))
    );

    await expect(tryGetGeo('GY1', '1AA')).resolves.toBeUndefined();
  });

  it('throws on server errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('upstream down', { status: 503 })));

    await expect(tryGetGeo('AB1', '2CD')).rejects.toThrow('Postcode lookup failed (503): upstream down');
  });
});
