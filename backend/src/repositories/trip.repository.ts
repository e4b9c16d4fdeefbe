/**
 * Trip Repository
 *
 * Persistence for planned trips. Supabase backs the `trip_plans` table; the
 * in-memory store is used when Supabase is not configured and in tests.
 */

import { randomUUID } from 'crypto';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { WeeklyMode } from '@hos-planner/shared';
import type {
  LocationResponse,
  RouteDataResponse,
  TripPlanResponse,
} from '../models/dtos/trip.dto';
import { BaseRepository } from './base.repository';

export interface TripRecord {
  id: string;
  created_at: string;
  current_location: LocationResponse;
  pickup_location: LocationResponse;
  dropoff_location: LocationResponse;
  current_cycle_used: number;
  weekly_mode: WeeklyMode;
  driver_name: string;
  carrier_name: string;
  main_office: string;
  vehicle_number: string;
  trip_plan: TripPlanResponse;
  route_data: RouteDataResponse | null;
}

export type NewTripRecord = Omit<TripRecord, 'id' | 'created_at'>;

export interface TripStore {
  save(record: NewTripRecord): Promise<TripRecord>;
  findById(id: string): Promise<TripRecord | null>;
  /** Newest first. */
  list(limit: number): Promise<TripRecord[]>;
}

export class SupabaseTripRepository extends BaseRepository<TripRecord> implements TripStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'trip_plans');
  }

  async save(record: NewTripRecord): Promise<TripRecord> {
    return this.create({
      ...record,
      id: randomUUID(),
      created_at: new Date().toISOString(),
    });
  }

  async list(limit: number): Promise<TripRecord[]> {
    return this.findRecent(limit);
  }
}

export class InMemoryTripStore implements TripStore {
  private readonly records = new Map<string, TripRecord>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = randomUUID
  ) {}

  async save(record: NewTripRecord): Promise<TripRecord> {
    const stored: TripRecord = {
      ...record,
      id: this.generateId(),
      created_at: this.now().toISOString(),
    };
    this.records.set(stored.id, stored);
    return stored;
  }

  async findById(id: string): Promise<TripRecord | null> {
    return this.records.get(id) ?? null;
  }

  async list(limit: number): Promise<TripRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, limit);
  }
}
