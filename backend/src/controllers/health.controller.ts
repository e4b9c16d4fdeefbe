/**
 * Health Controller
 *
 * Reports trip store, Redis and routing provider status.
 */

import type { Request, Response } from 'express';
import type { SupabaseClient } from '@supabase/supabase-js';
import { BaseController } from './base.controller';
import type { HealthCheckResponse, ServiceHealth } from '../models/dtos/common.dto';
import { checkDatabaseConnection } from '../config/supabase';
import { isRedisAvailable, isRedisEnabled } from '../config/redis';
import { logger } from '../utils/logger';
import type { RoutingProviderName } from '../services/routing.service';

export interface HealthDependencies {
  supabase: SupabaseClient | null;
  routingProvider: RoutingProviderName;
}

export class HealthController extends BaseController {
  constructor(private readonly deps: HealthDependencies) {
    super();
  }

  /**
   * GET /health
   */
  async checkHealth(req: Request, res: Response): Promise<Response> {
    const tripStore = await this.checkTripStore();
    const redis: ServiceHealth = !isRedisEnabled()
      ? { status: 'disabled' }
      : { status: isRedisAvailable() ? 'up' : 'down' };

    const health: HealthCheckResponse = {
      status: tripStore.status === 'down' || redis.status === 'down' ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.API_VERSION || 'v1',
      uptime: process.uptime(),
      services: {
        tripStore,
        redis,
        routing: { provider: this.deps.routingProvider },
      },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', { services: health.services });
    }

    return this.success(res, health);
  }

  /**
   * The in-memory store is always up.
   */
  private async checkTripStore(): Promise<ServiceHealth> {
    if (this.deps.supabase === null) {
      return { status: 'up' };
    }
    return checkDatabaseConnection(this.deps.supabase);
  }
}
