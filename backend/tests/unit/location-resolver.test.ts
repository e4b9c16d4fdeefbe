/**
 * Location Resolver Unit Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { AzureMapsConfig } from '../../src/config/azure-maps';
import type { FetchFn } from '../../src/services/azure-maps-client';
import {
  AzureMapsLocationResolver,
  NoopLocationResolver,
  createLocationResolver,
  parsePlaceName,
  resolvePlace,
  type LocationResolver,
} from '../../src/services/location-resolver.service';

const CONFIG: AzureMapsConfig = {
  subscriptionKey: 'test-key',
  baseUrl: 'https://maps.test',
  routingTimeoutMs: 1000,
  geocoderTimeoutMs: 1000,
};

const POINT = { latitude: 39.78, longitude: -89.65 };

function resolverReturning(address: string): LocationResolver {
  return { resolve: async () => address };
}

describe('parsePlaceName', () => {
  it('should take city and region from the last two tokens', () => {
    expect(parsePlaceName('100 Main St, Springfield, IL')).toEqual({ city: 'Springfield', region: 'IL' });
  });

  it('should ignore empty tokens', () => {
    expect(parsePlaceName('Springfield, IL, ')).toEqual({ city: 'Springfield', region: 'IL' });
  });

  it('should return null for a single token', () => {
    expect(parsePlaceName('Springfield')).toBeNull();
  });
});

describe('resolvePlace', () => {
  it('should resolve a parseable address', async () => {
    const result = await resolvePlace(resolverReturning('Springfield, IL'), POINT, 100);
    expect(result).toEqual({ status: 'resolved', place: { city: 'Springfield', region: 'IL' } });
  });

  it('should report an empty address as unavailable', async () => {
    const result = await resolvePlace(new NoopLocationResolver(), POINT, 100);
    expect(result).toEqual({ status: 'unavailable', place: { city: 'Unknown', region: 'Unknown' } });
  });

  it('should report an unparseable address as failed', async () => {
    const result = await resolvePlace(resolverReturning('Springfield'), POINT, 100);
    expect(result).toEqual({
      status: 'failed',
      place: { city: 'Unknown', region: 'Unknown' },
      reason: 'Unparseable address "Springfield"',
    });
  });

  it('should report a resolver error as failed', async () => {
    const resolver: LocationResolver = {
      resolve: async () => {
        throw new Error('geocoder offline');
      },
    };

    const result = await resolvePlace(resolver, POINT, 100);
    expect(result).toEqual({
      status: 'failed',
      place: { city: 'Unknown', region: 'Unknown' },
      reason: 'geocoder offline',
    });
  });

  it('should give up on a slow resolver', async () => {
    const resolver: LocationResolver = { resolve: () => new Promise<string>(() => undefined) };

    const result = await resolvePlace(resolver, POINT, 10);
    expect(result).toEqual({
      status: 'failed',
      place: { city: 'Unknown', region: 'Unknown' },
      reason: 'Reverse geocoding timed out after 10ms',
    });
  });
});

describe('AzureMapsLocationResolver', () => {
  function addressFetch(addresses: unknown[]) {
    return jest.fn<FetchFn>(
      async () => new Response(JSON.stringify({ addresses }), { status: 200 })
    );
  }

  it('should join street, municipality and subdivision', async () => {
    const fetchImpl = addressFetch([
      {
        address: {
          streetNumber: '100',
          streetName: 'Main St',
          municipality: 'Springfield',
          countrySubdivision: 'IL',
        },
      },
    ]);
    const resolver = new AzureMapsLocationResolver(CONFIG, fetchImpl);

    await expect(resolver.resolve(39.78, -89.65)).resolves.toBe('100 Main St, Springfield, IL');

    const url = String(fetchImpl.mock.calls[0][0]);
    expect(url.startsWith('https://maps.test/search/address/reverse/json?')).toBe(true);
    expect(url).toContain('query=39.78%2C-89.65');
  });

  it('should fall back to the freeform address', async () => {
    const resolver = new AzureMapsLocationResolver(
      CONFIG,
      addressFetch([{ address: { freeformAddress: 'Somewhere, NV' } }])
    );

    await expect(resolver.resolve(36.1, -115.1)).resolves.toBe('Somewhere, NV');
  });

  it('should return an empty string when nothing is found', async () => {
    const resolver = new AzureMapsLocationResolver(CONFIG, addressFetch([]));

    await expect(resolver.resolve(0, 0)).resolves.toBe('');
  });

  it('should reject on a failed request', async () => {
    const fetchImpl = jest.fn<FetchFn>(async () => new Response('{}', { status: 403 }));
    const resolver = new AzureMapsLocationResolver(CONFIG, fetchImpl);

    await expect(resolver.resolve(0, 0)).rejects.toThrow('Azure Maps request failed (403)');
  });
});

describe('createLocationResolver', () => {
  it('should use the no-op resolver without a subscription key', () => {
    expect(createLocationResolver({ ...CONFIG, subscriptionKey: undefined })).toBeInstanceOf(
      NoopLocationResolver
    );
  });

  it('should use Azure Maps with a subscription key', () => {
    expect(createLocationResolver(CONFIG)).toBeInstanceOf(AzureMapsLocationResolver);
  });
});
