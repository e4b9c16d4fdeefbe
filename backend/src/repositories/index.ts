/**
 * Repository Index
 *
 * Central export point for repositories, plus the factory that picks the trip
 * store for the current configuration.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { InMemoryTripStore, SupabaseTripRepository, type TripStore } from './trip.repository';

export { BaseRepository } from './base.repository';
export {
  InMemoryTripStore,
  SupabaseTripRepository,
  type NewTripRecord,
  type TripRecord,
  type TripStore,
} from './trip.repository';

/**
 * Supabase-backed store when a client is available, in-memory otherwise.
 */
export function createTripStore(supabase: SupabaseClient | null): TripStore {
  return supabase ? new SupabaseTripRepository(supabase) : new InMemoryTripStore();
}
