import { createClient, SupabaseClient } from '@supabase/supabase-js';

/**
 * Supabase is optional: without credentials the storage service keeps
 * everything on the file system.
 */
export function createSupabaseClient(url: string, key: string): SupabaseClient | null {
    if (!url || !key) return null;
    return createClient(url, key);
}

// Database schema types
export interface MigrationState {
    id?: number;
    key: string;
    value: unknown;
    created_at?: string;
    updated_at?: string;
}

export const MIGRATION_STATE_TABLE = 'migration_state';
