import { EntityCatalog } from './EntityCatalog';
import { MappingTable } from './MappingTable';
import {
    MigrationError,
    UnmappedDatabaseError,
    UnmappedFieldError,
    UnmappedTableError,
    type IdentifierKind
} from '../errors';
import type { CatalogEntry, DatabaseMap, UnmappedEntity } from '../types';

export interface MappingOverride {
    sourceId: number;
    targetId: number;
}

export interface MappingOverrides {
    tables?: MappingOverride[];
    fields?: MappingOverride[];
}

type MappingMiss = UnmappedDatabaseError | UnmappedTableError | UnmappedFieldError;

/**
 * Builds the database, table and field mappings between two catalogs.
 * Card, collection and dashboard mappings are filled in later, as the import creates
 * or matches content on the target.
 */
export class IdentifierMapper {
    readonly mapping = new MappingTable();
    private misses = new Map<string, MappingMiss>();
    private tableOverrides: Map<number, number>;
    private fieldOverrides: Map<number, number>;

    constructor(
        private source: EntityCatalog,
        private target: EntityCatalog,
        private dbMap: DatabaseMap,
        overrides: MappingOverrides = {}
    ) {
        this.tableOverrides = new Map((overrides.tables ?? []).map(o => [o.sourceId, o.targetId]));
        this.fieldOverrides = new Map((overrides.fields ?? []).map(o => [o.sourceId, o.targetId]));
    }

    resolveDatabase(sourceDatabaseId: number): number {
        const sourceName = this.source.get('database', sourceDatabaseId)?.name ?? null;
        const idKey = String(sourceDatabaseId);

        let targetId: number | undefined = Object.hasOwn(this.dbMap.by_id, idKey)
            ? this.dbMap.by_id[idKey]
            : undefined;
        if (targetId === undefined && sourceName !== null && Object.hasOwn(this.dbMap.by_name, sourceName)) {
            targetId = this.dbMap.by_name[sourceName];
        }

        if (targetId === undefined) {
            throw new UnmappedDatabaseError(sourceDatabaseId, sourceName);
        }
        if (!this.target.get('database', targetId)) {
            throw new UnmappedDatabaseError(
                sourceDatabaseId,
                sourceName,
                `target database ${targetId} does not exist`
            );
        }
        return targetId;
    }

    build(): MigrationError[] {
        this.misses.clear();

        for (const db of this.source.all('database')) {
            let targetDbId: number;
            try {
                targetDbId = this.resolveDatabase(db.nativeId);
            } catch (error) {
                if (!(error instanceof UnmappedDatabaseError)) throw error;
                this.misses.set(this.missKey('database', db.nativeId), error);
                console.warn(`⚠️  ${error.message}`);
                continue;
            }
            this.mapping.set('database', db.nativeId, targetDbId);
            this.mapTables(db, targetDbId);
        }

        const issues = this.issues();
        const mapped = this.mapping.size('table');
        console.log(`Mapped ${this.mapping.size('database')} databases, ${mapped} tables, ${this.mapping.size('field')} fields (${issues.length} unmapped)`);
        return issues;
    }

    setCardMapping(sourceCardId: number, targetCardId: number): void {
        this.mapping.set('card', sourceCardId, targetCardId);
    }

    issues(): MigrationError[] {
        return Array.from(this.misses.values());
    }

    unmappedEntities(): UnmappedEntity[] {
        return this.issues().map((error): UnmappedEntity => {
            if (error instanceof UnmappedDatabaseError) {
                return {
                    kind: 'database',
                    sourceId: error.sourceDatabaseId,
                    name: error.sourceDatabaseName ?? String(error.sourceDatabaseId),
                    message: error.message,
                };
            }
            if (error instanceof UnmappedTableError) {
                return { kind: 'table', sourceId: error.sourceTableId, name: error.sourceTableName, message: error.message };
            }
            if (error instanceof UnmappedFieldError) {
                return {
                    kind: 'field',
                    sourceId: error.sourceFieldId,
                    name: `${error.sourceTableName}.${error.sourceFieldName}`,
                    message: error.message,
                };
            }
            return { kind: 'database', sourceId: -1, name: 'unknown', message: error.message };
        });
    }

    /**
     * The recorded miss behind an unmapped source id. A field of an unmapped table
     * explains as the table's miss, a table of an unmapped database as the database's.
     */
    explain(kind: IdentifierKind, sourceId: number): MigrationError | undefined {
        const direct = this.misses.get(this.missKey(kind, sourceId));
        if (direct) return direct;

        if (kind === 'field' || kind === 'table') {
            const entry = this.source.get(kind, sourceId);
            if (entry && entry.parentId !== null) {
                return this.explain(kind === 'field' ? 'table' : 'database', entry.parentId);
            }
        }
        return undefined;
    }

    /** "table 12 (orders)" style label for diagnostics. */
    describe(kind: IdentifierKind, sourceId: number): string {
        if (kind === 'database' || kind === 'table' || kind === 'field') {
            const entry = this.source.get(kind, sourceId);
            if (entry) return `${kind} ${sourceId} (${entry.name})`;
        }
        return `${kind} ${sourceId}`;
    }

    private mapTables(db: CatalogEntry, targetDbId: number) {
        for (const table of this.source.children('table', db.nativeId)) {
            const override = this.tableOverrides.get(table.nativeId);
            if (override !== undefined) {
                this.mapping.set('table', table.nativeId, override);
                this.mapFields(table, override);
                continue;
            }

            const candidates = this.target.findByName('table', table.name, targetDbId);
            const match = candidates.find(c => c.schema === table.schema) ?? candidates[0];
            if (!match) {
                const error = new UnmappedTableError(table.nativeId, table.name, db.nativeId, targetDbId);
                this.misses.set(this.missKey('table', table.nativeId), error);
                console.warn(`⚠️  ${error.message}`);
                this.applyFieldOverrides(table);
                continue;
            }
            if (match.schema !== table.schema) {
                console.warn(
                    `Ambiguous table '${table.name}': no candidate in schema ${table.schema ?? '(none)'}, using ${match.schema ?? '(none)'}.${match.name} (ID: ${match.nativeId})`
                );
            }

            this.mapping.set('table', table.nativeId, match.nativeId);
            this.mapFields(table, match.nativeId);
        }
    }

    /** Field overrides take effect even when their table found no match. */
    private applyFieldOverrides(table: CatalogEntry) {
        for (const field of this.source.children('field', table.nativeId)) {
            const override = this.fieldOverrides.get(field.nativeId);
            if (override === undefined) continue;
            this.mapping.set('field', field.nativeId, override);
            console.warn(`⚠️  Field override ${field.nativeId} → ${override} applied while table '${table.name}' (ID: ${table.nativeId}) is unmapped`);
        }
    }

    private mapFields(table: CatalogEntry, targetTableId: number) {
        for (const field of this.source.children('field', table.nativeId)) {
            const override = this.fieldOverrides.get(field.nativeId);
            if (override !== undefined) {
                this.mapping.set('field', field.nativeId, override);
                continue;
            }

            const match = this.target.findByName('field', field.name, targetTableId)[0];
            if (!match) {
                const error = new UnmappedFieldError(field.nativeId, field.name, table.name, targetTableId);
                this.misses.set(this.missKey('field', field.nativeId), error);
                console.warn(`⚠️  ${error.message}`);
                continue;
            }
            this.mapping.set('field', field.nativeId, match.nativeId);
        }
    }

    private missKey(kind: IdentifierKind, sourceId: number): string {
        return `${kind}:${sourceId}`;
    }
}
