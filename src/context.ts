import fs from 'fs-extra';
import type { Config } from './config';
import { createSupabase } from './lib/supabase';
import { ExportManager } from './services/ExportManager';
import { ImportManager } from './services/ImportManager';
import { ManifestStore } from './services/ManifestStore';
import { MetabaseClient, RetryBudget, type RetryPolicy } from './services/MetabaseClient';
import { StorageService } from './services/StorageService';
import { databaseMapSchema, type DatabaseMap } from './types';

/** Wires services from configuration; the entry points are its only callers. */

export async function loadDatabaseMap(filePath: string): Promise<DatabaseMap> {
    if (!(await fs.pathExists(filePath))) {
        throw new Error(`Database map not found at ${filePath}; copy db_map.example.json and fill it in`);
    }
    const parsed = databaseMapSchema.safeParse(await fs.readJson(filePath));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid database map ${filePath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`);
    }
    return parsed.data;
}

export function createStorage(config: Config): StorageService {
    return new StorageService({
        baseDir: config.stateDir,
        supabase: createSupabase(config.supabaseUrl, config.supabaseAnonKey),
    });
}

/** `MAX_RETRIES` counts retries; the client counts attempts, the first request included. */
export function retryPolicy(config: Pick<Config, 'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs'>): RetryPolicy {
    return {
        maxAttempts: config.maxRetries + 1,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
    };
}

export function createClient(
    config: Config,
    side: 'source' | 'target',
    budget = new RetryBudget(config.retryBudget)
): MetabaseClient {
    return new MetabaseClient({
        baseUrl: side === 'source' ? config.sourceUrl : config.targetUrl,
        apiKey: side === 'source' ? config.sourceApiKey : config.targetApiKey,
        retry: retryPolicy(config),
        budget,
    });
}

export function createExportManager(config: Config, storage: StorageService): ExportManager {
    const budget = new RetryBudget(config.retryBudget);
    return new ExportManager(createClient(config, 'source', budget), new ManifestStore(), storage);
}

export async function createImportManager(config: Config, storage: StorageService): Promise<ImportManager> {
    const budget = new RetryBudget(config.retryBudget);
    return new ImportManager({
        target: createClient(config, 'target', budget),
        storage,
        exportDir: config.exportDir,
        dbMap: await loadDatabaseMap(config.dbMapPath),
    });
}
