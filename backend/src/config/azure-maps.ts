/**
 * Azure Maps Configuration
 *
 * Routing (truck route directions) and reverse geocoding. Without a
 * subscription key the service plans with straight-line distances and
 * leaves place names unresolved.
 */

export interface AzureMapsConfig {
  subscriptionKey?: string;
  baseUrl: string;
  /** Per-request timeout for route directions. */
  routingTimeoutMs: number;
  /** Upper bound on one reverse-geocoding lookup. */
  geocoderTimeoutMs: number;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadAzureMapsConfig(env: NodeJS.ProcessEnv = process.env): AzureMapsConfig {
  const subscriptionKey = env.AZURE_MAPS_SUBSCRIPTION_KEY?.trim();

  return {
    subscriptionKey: subscriptionKey ? subscriptionKey : undefined,
    baseUrl: env.AZURE_MAPS_BASE_URL || 'https://atlas.microsoft.com',
    routingTimeoutMs: parsePositiveInt(env.ROUTING_TIMEOUT_MS, 10_000),
    geocoderTimeoutMs: parsePositiveInt(env.GEOCODER_TIMEOUT_MS, 5_000),
  };
}
