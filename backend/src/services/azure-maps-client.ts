/**
 * Azure Maps HTTP client
 *
 * Thin GET wrapper shared by routing and reverse geocoding. 5xx and 429 replies
 * are raised as "service unavailable" so the retry classifier treats them as
 * transient; other non-2xx replies are final.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { AzureMapsConfig } from '../config/azure-maps';
import { ExternalServiceError } from '../models/errors/api-error';
import { logHelpers } from '../utils/logger';

export type FetchFn = typeof fetch;

export const AZURE_MAPS_SERVICE = 'azure-maps';

export class AzureMapsClient {
  constructor(
    private readonly config: AzureMapsConfig,
    private readonly fetchImpl: FetchFn = fetch
  ) {}

  async get<T>(
    path: string,
    params: Record<string, string>,
    schema: ZodType<T, ZodTypeDef, unknown>,
    timeoutMs: number
  ): Promise<T> {
    if (this.config.subscriptionKey === undefined) {
      throw new ExternalServiceError(AZURE_MAPS_SERVICE, 'Azure Maps subscription key is not configured');
    }

    const query = new URLSearchParams({
      'api-version': '1.0',
      ...params,
      'subscription-key': this.config.subscriptionKey,
    });
    const url = `${this.config.baseUrl}${path}?${query.toString()}`;

    logHelpers.externalCall(AZURE_MAPS_SERVICE, `GET ${path}`, { params });

    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });

    if (!response.ok) {
      const transient = response.status >= 500 || response.status === 429;
      throw new ExternalServiceError(
        AZURE_MAPS_SERVICE,
        transient
          ? `Azure Maps service unavailable (${response.status})`
          : `Azure Maps request failed (${response.status})`
      );
    }

    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(AZURE_MAPS_SERVICE, `Unexpected Azure Maps response for ${path}`);
    }

    return parsed.data;
  }
}
