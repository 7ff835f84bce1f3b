import fs from 'fs-extra';
import path from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { fieldOverrideRowSchema, migrationStateRowSchema, tableOverrideRowSchema } from '../lib/supabase';
import { jsonValueSchema, type JsonValue } from '../lib/json';
import type { MappingOverride, MappingOverrides } from './IdentifierMapper';

export interface StorageOptions {
    /** Directory for the file backend. */
    baseDir: string;
    supabase?: SupabaseClient | null;
}

type OverrideKind = 'table' | 'field';

const STATE_KEY = /^[A-Za-z0-9_-]+$/;
const overrideListSchema = z.array(z.object({ sourceId: z.number().int(), targetId: z.number().int() }));

/**
 * Mapping overrides and run state. Supabase when configured, JSON files in
 * `baseDir` otherwise.
 */
export class StorageService {
    private supabase: SupabaseClient | null;
    private baseDir: string;

    constructor(options: StorageOptions) {
        this.supabase = options.supabase ?? null;
        this.baseDir = options.baseDir;

        if (this.supabase) {
            console.log('✅ Using Supabase for persistent storage');
        } else {
            console.log(`⚠️  Using file system for state (${this.baseDir})`);
        }
    }

    get backend(): 'supabase' | 'file' {
        return this.supabase ? 'supabase' : 'file';
    }

    // ======================
    // MAPPING OVERRIDES
    // ======================

    async getOverrides(): Promise<MappingOverrides> {
        return {
            tables: await this.getOverrideList('table'),
            fields: await this.getOverrideList('field'),
        };
    }

    async getOverrideList(kind: OverrideKind): Promise<MappingOverride[]> {
        if (this.supabase) {
            if (kind === 'table') {
                const { data, error } = await this.supabase
                    .from('table_mappings')
                    .select('source_table_id, target_table_id')
                    .order('source_table_id');
                if (error) throw new Error(`Supabase table_mappings: ${error.message}`);
                return z.array(tableOverrideRowSchema).parse(data ?? [])
                    .map(r => ({ sourceId: r.source_table_id, targetId: r.target_table_id }));
            }
            const { data, error } = await this.supabase
                .from('field_mappings')
                .select('source_field_id, target_field_id')
                .order('source_field_id');
            if (error) throw new Error(`Supabase field_mappings: ${error.message}`);
            return z.array(fieldOverrideRowSchema).parse(data ?? [])
                .map(r => ({ sourceId: r.source_field_id, targetId: r.target_field_id }));
        }

        const filePath = this.overrideFile(kind);
        if (!(await fs.pathExists(filePath))) return [];
        return overrideListSchema.parse(await fs.readJson(filePath));
    }

    async saveOverride(kind: OverrideKind, override: MappingOverride): Promise<void> {
        if (this.supabase) {
            const { error } = kind === 'table'
                ? await this.supabase
                    .from('table_mappings')
                    .upsert({ source_table_id: override.sourceId, target_table_id: override.targetId }, { onConflict: 'source_table_id' })
                : await this.supabase
                    .from('field_mappings')
                    .upsert({ source_field_id: override.sourceId, target_field_id: override.targetId }, { onConflict: 'source_field_id' });
            if (error) throw new Error(`Supabase ${kind}_mappings: ${error.message}`);
            return;
        }

        const overrides = (await this.getOverrideList(kind)).filter(o => o.sourceId !== override.sourceId);
        overrides.push({ sourceId: override.sourceId, targetId: override.targetId });
        overrides.sort((a, b) => a.sourceId - b.sourceId);
        await fs.ensureDir(this.baseDir);
        await fs.writeJson(this.overrideFile(kind), overrides, { spaces: 2 });
    }

    async deleteOverride(kind: OverrideKind, sourceId: number): Promise<void> {
        if (this.supabase) {
            const { error } = kind === 'table'
                ? await this.supabase.from('table_mappings').delete().eq('source_table_id', sourceId)
                : await this.supabase.from('field_mappings').delete().eq('source_field_id', sourceId);
            if (error) throw new Error(`Supabase ${kind}_mappings: ${error.message}`);
            return;
        }

        const overrides = await this.getOverrideList(kind);
        const remaining = overrides.filter(o => o.sourceId !== sourceId);
        if (remaining.length === overrides.length) return;
        await fs.writeJson(this.overrideFile(kind), remaining, { spaces: 2 });
    }

    // ======================
    // GENERIC STATE
    // ======================

    async getState(key: string): Promise<JsonValue | null> {
        this.checkKey(key);
        if (this.supabase) {
            const { data, error } = await this.supabase
                .from('migration_state')
                .select('value')
                .eq('key', key)
                .maybeSingle();
            if (error) throw new Error(`Supabase migration_state: ${error.message}`);
            return data ? migrationStateRowSchema.pick({ value: true }).parse(data).value : null;
        }

        const filePath = path.join(this.baseDir, `${key}.json`);
        if (!(await fs.pathExists(filePath))) return null;
        return jsonValueSchema.parse(await fs.readJson(filePath));
    }

    async setState(key: string, value: JsonValue): Promise<void> {
        this.checkKey(key);
        if (this.supabase) {
            const { error } = await this.supabase
                .from('migration_state')
                .upsert({ key, value, updated_at: new Date().toISOString() }, { onConflict: 'key' });
            if (error) throw new Error(`Supabase migration_state: ${error.message}`);
            return;
        }

        await fs.ensureDir(this.baseDir);
        await fs.writeJson(path.join(this.baseDir, `${key}.json`), value, { spaces: 2 });
    }

    private overrideFile(kind: OverrideKind): string {
        return path.join(this.baseDir, `${kind}_overrides.json`);
    }

    private checkKey(key: string) {
        if (!STATE_KEY.test(key)) {
            throw new Error(`Invalid state key '${key}'`);
        }
    }
}
