/**
 * Base Repository
 *
 * Common Supabase operations for table-backed repositories.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { DatabaseError } from '../models/errors/api-error';
import { logger, logHelpers } from '../utils/logger';

export abstract class BaseRepository<T extends { id: string }> {
  protected supabase: SupabaseClient;
  protected tableName: string;

  constructor(supabase: SupabaseClient, tableName: string) {
    this.supabase = supabase;
    this.tableName = tableName;
  }

  /**
   * Find a single record by ID
   */
  async findById(id: string): Promise<T | null> {
    const startedAt = Date.now();

    try {
      const { data, error } = await this.supabase
        .from(this.tableName)
        .select('*')
        .eq('id', id)
        .maybeSingle();

      logHelpers.dbQuery('findById', this.tableName, Date.now() - startedAt);

      if (error) {
        logger.error(`Failed to find ${this.tableName} by ID`, { id, error });
        throw new DatabaseError(`Failed to find ${this.tableName}`);
      }

      return data === null ? null : (data as T);
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      logger.error(`Unexpected error in findById for ${this.tableName}`, { id, error });
      throw new DatabaseError('Database operation failed');
    }
  }

  /**
   * Most recent records, newest first
   */
  async findRecent(limit: number, orderColumn = 'created_at'): Promise<T[]> {
    const startedAt = Date.now();

    try {
      const { data, error } = await this.supabase
        .from(this.tableName)
        .select('*')
        .order(orderColumn, { ascending: false })
        .limit(limit);

      logHelpers.dbQuery('findRecent', this.tableName, Date.now() - startedAt);

      if (error) {
        logger.error(`Failed to list ${this.tableName}`, { limit, error });
        throw new DatabaseError(`Failed to query ${this.tableName}`);
      }

      return (data as T[]) || [];
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      logger.error(`Unexpected error in findRecent for ${this.tableName}`, { limit, error });
      throw new DatabaseError('Database operation failed');
    }
  }

  /**
   * Insert a record and return the stored row
   */
  async create(record: T): Promise<T> {
    try {
      const { data: created, error } = await this.supabase
        .from(this.tableName)
        .insert(record)
        .select()
        .single();

      if (error) {
        logger.error(`Failed to create ${this.tableName}`, { id: record.id, error });
        throw new DatabaseError(`Failed to create ${this.tableName}: ${error.message}`);
      }

      logger.debug(`Created ${this.tableName}`, { id: record.id });
      return created as T;
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      logger.error(`Unexpected error in create for ${this.tableName}`, { id: record.id, error });
      throw new DatabaseError('Database operation failed');
    }
  }
}
