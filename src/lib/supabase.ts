import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { jsonValueSchema } from './json';

/** Null when either credential is missing; callers fall back to local files. */
export function createSupabase(url: string, anonKey: string): SupabaseClient | null {
    if (!url || !anonKey) return null;
    return createClient(url, anonKey, { auth: { persistSession: false } });
}

// Table rows

export const tableOverrideRowSchema = z.object({
    source_table_id: z.number().int(),
    target_table_id: z.number().int(),
});

export const fieldOverrideRowSchema = z.object({
    source_field_id: z.number().int(),
    target_field_id: z.number().int(),
});

export const migrationStateRowSchema = z.object({
    key: z.string(),
    value: jsonValueSchema,
});
