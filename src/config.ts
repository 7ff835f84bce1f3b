import dotenv from 'dotenv';
import { conflictStrategySchema, type ConflictStrategy } from './types';
dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function int(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseIdList(value: string | undefined): number[] {
    return (value || '')
        .split(',')
        .map(part => parseInt(part.trim(), 10))
        .filter(id => !Number.isNaN(id));
}

function conflictStrategy(value: string | undefined): ConflictStrategy {
    const parsed = conflictStrategySchema.safeParse(value || 'skip');
    if (!parsed.success) {
        console.warn(`Warning: CONFLICT_STRATEGY '${value}' is not one of skip, overwrite, rename; using skip.`);
        return 'skip';
    }
    return parsed.data;
}

export const config = {
    sourceUrl: process.env.SOURCE_METABASE_URL || '',
    sourceApiKey: process.env.SOURCE_METABASE_API_KEY || '',
    targetUrl: process.env.TARGET_METABASE_URL || '',
    targetApiKey: process.env.TARGET_METABASE_API_KEY || '',
    exportDir: process.env.EXPORT_DIR || './metabase_export',
    dbMapPath: process.env.DB_MAP_PATH || './db_map.json',
    conflictStrategy: conflictStrategy(process.env.CONFLICT_STRATEGY),
    includeArchived: flag(process.env.INCLUDE_ARCHIVED, false),
    includeDashboards: flag(process.env.INCLUDE_DASHBOARDS, true),
    rootCollectionIds: parseIdList(process.env.ROOT_COLLECTION_IDS),
    maxRetries: int(process.env.MAX_RETRIES, 3),
    retryBaseDelayMs: int(process.env.RETRY_BASE_DELAY_MS, 500),
    retryMaxDelayMs: int(process.env.RETRY_MAX_DELAY_MS, 8000),
    retryBudget: int(process.env.RETRY_BUDGET, 50),
    port: int(process.env.PORT, 3001),
    stateDir: process.env.STATE_DIR || '.',
    supabaseUrl: process.env.SUPABASE_URL || '',
    supabaseAnonKey: process.env.SUPABASE_ANON_KEY || '',
};

export type Config = typeof config;

if (!config.sourceUrl || !config.sourceApiKey) {
    console.warn('Warning: SOURCE_METABASE_URL or SOURCE_METABASE_API_KEY is missing. Export will fail until these are set.');
}
if (!config.targetUrl || !config.targetApiKey) {
    console.warn('Warning: TARGET_METABASE_URL or TARGET_METABASE_API_KEY is missing. Import will fail until these are set.');
}
