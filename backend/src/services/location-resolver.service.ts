/**
 * Location Resolver Service
 *
 * Reverse geocoding for the places printed on duty events and log-sheet
 * remarks. Lookups are bounded by a timeout and never fail a plan: anything
 * that goes wrong degrades to "Unknown, Unknown".
 */

import { z } from 'zod';
import { UNKNOWN_PLACE, type Coordinates, type PlaceName } from '@hos-planner/shared';
import type { AzureMapsConfig } from '../config/azure-maps';
import { logger } from '../utils/logger';
import { AzureMapsClient, type FetchFn } from './azure-maps-client';

export interface LocationResolver {
  /** Comma-separated address ending in "city, region", or '' when unknown. */
  resolve(latitude: number, longitude: number): Promise<string>;
}

export class NoopLocationResolver implements LocationResolver {
  async resolve(): Promise<string> {
    return '';
  }
}

const reverseAddressSchema = z.object({
  addresses: z.array(
    z.object({
      address: z.object({
        streetNumber: z.string().optional(),
        streetName: z.string().optional(),
        municipality: z.string().optional(),
        countrySubdivision: z.string().optional(),
        freeformAddress: z.string().optional(),
      }),
    })
  ),
});

export class AzureMapsLocationResolver implements LocationResolver {
  private readonly client: AzureMapsClient;

  constructor(private readonly config: AzureMapsConfig, fetchImpl?: FetchFn) {
    this.client = new AzureMapsClient(config, fetchImpl);
  }

  async resolve(latitude: number, longitude: number): Promise<string> {
    const body = await this.client.get(
      '/search/address/reverse/json',
      { query: `${latitude},${longitude}` },
      reverseAddressSchema,
      this.config.geocoderTimeoutMs
    );

    if (body.addresses.length === 0) {
      return '';
    }

    const { streetNumber, streetName, municipality, countrySubdivision, freeformAddress } =
      body.addresses[0].address;
    const parts: string[] = [];
    if (streetName) {
      parts.push(streetNumber ? `${streetNumber} ${streetName}` : streetName);
    }
    if (municipality) parts.push(municipality);
    if (countrySubdivision) parts.push(countrySubdivision);

    return parts.length > 0 ? parts.join(', ') : freeformAddress ?? '';
  }
}

export function createLocationResolver(config: AzureMapsConfig): LocationResolver {
  return config.subscriptionKey === undefined
    ? new NoopLocationResolver()
    : new AzureMapsLocationResolver(config);
}

// ============================================================================
// Place resolution
// ============================================================================

export type PlaceResolution =
  | { status: 'resolved'; place: PlaceName }
  /** The resolver had nothing to say (no-op resolver, no address found). */
  | { status: 'unavailable'; place: PlaceName }
  | { status: 'failed'; place: PlaceName; reason: string };

/**
 * City and region from the last two comma-separated tokens of an address.
 */
export function parsePlaceName(address: string): PlaceName | null {
  const tokens = address
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  if (tokens.length < 2) {
    return null;
  }

  return { city: tokens[tokens.length - 2], region: tokens[tokens.length - 1] };
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function resolvePlace(
  resolver: LocationResolver,
  coordinates: Coordinates,
  timeoutMs: number
): Promise<PlaceResolution> {
  let address: string;

  try {
    address = await withTimeout(
      resolver.resolve(coordinates.latitude, coordinates.longitude),
      timeoutMs,
      'Reverse geocoding'
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn('Location resolution failed', { ...coordinates, reason });
    return { status: 'failed', place: { ...UNKNOWN_PLACE }, reason };
  }

  if (address.trim() === '') {
    return { status: 'unavailable', place: { ...UNKNOWN_PLACE } };
  }

  const place = parsePlaceName(address);
  if (place === null) {
    logger.warn('Could not parse resolved address', { ...coordinates, address });
    return { status: 'failed', place: { ...UNKNOWN_PLACE }, reason: `Unparseable address "${address}"` };
  }

  return { status: 'resolved', place };
}
