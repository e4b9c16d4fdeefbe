/**
 * Supabase Database Configuration
 *
 * Service-role client for the trip store. Supabase is optional: without
 * SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY trips are kept in memory.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger';

/**
 * Returns null when Supabase is not configured.
 */
export function createSupabaseClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient | null {
  const url = env.SUPABASE_URL;
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !serviceRoleKey) {
    logger.info('Supabase not configured, trips will be stored in memory');
    return null;
  }

  const client = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  logger.info('Supabase client initialized', { url });
  return client;
}

/**
 * Lightweight connectivity probe for the health endpoint.
 */
export async function checkDatabaseConnection(client: SupabaseClient): Promise<{
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}> {
  const startTime = Date.now();

  try {
    const { error } = await client.from('trip_plans').select('id').limit(1);
    if (error) {
      throw new Error(error.message);
    }
    return { status: 'up', latency: Date.now() - startTime };
  } catch (error) {
    logger.error('Database health check failed', { error });
    return { status: 'down', error: error instanceof Error ? error.message : 'Unknown error' };
  }
}
