import type { CatalogEntry, CatalogKind, DatabaseMetadata, DatabaseSummary } from '../types';

/**
 * Inventory of databases, tables and fields seen on one Metabase instance,
 * keyed by name within the parent scope (database for tables, table for fields).
 *
 * Built once per export or import run and then only read.
 */
export class EntityCatalog {
    private entries = new Map<string, CatalogEntry>();
    private byId = new Map<string, CatalogEntry>();
    private byParent = new Map<string, Map<string, CatalogEntry>>();

    static fromEntries(entries: CatalogEntry[]): EntityCatalog {
        const catalog = new EntityCatalog();
        for (const e of entries) {
            catalog.record(e.kind, e.name, e.parentId, e.nativeId, e.schema);
        }
        return catalog;
    }

    /**
     * Recording the same (kind, parent, schema, name) again replaces the native id;
     * the entry keeps its original position.
     */
    record(kind: CatalogKind, name: string, parentId: number | null, nativeId: number, schema?: string): CatalogEntry {
        const key = this.key(kind, name, parentId, schema);
        const previous = this.entries.get(key);
        if (previous) {
            this.byId.delete(this.idKey(kind, previous.nativeId));
        }

        const entry: CatalogEntry = { kind, name, parentId, nativeId };
        if (schema !== undefined) entry.schema = schema;

        this.entries.set(key, entry);
        this.byId.set(this.idKey(kind, nativeId), entry);

        const scopeKey = this.scopeKey(kind, parentId);
        let scope = this.byParent.get(scopeKey);
        if (!scope) {
            scope = new Map();
            this.byParent.set(scopeKey, scope);
        }
        scope.set(key, entry);
        return entry;
    }

    recordDatabase(db: DatabaseSummary): void {
        this.record('database', db.name, null, db.id);
    }

    recordMetadata(metadata: DatabaseMetadata): void {
        this.record('database', metadata.name, null, metadata.id);
        for (const table of metadata.tables) {
            this.record('table', table.name, metadata.id, table.id, table.schema ?? undefined);
            for (const field of table.fields) {
                this.record('field', field.name, table.id, field.id);
            }
        }
    }

    all(kind: CatalogKind): CatalogEntry[] {
        return Array.from(this.entries.values()).filter(e => e.kind === kind);
    }

    get(kind: CatalogKind, nativeId: number): CatalogEntry | undefined {
        return this.byId.get(this.idKey(kind, nativeId));
    }

    children(kind: CatalogKind, parentId: number | null): CatalogEntry[] {
        const scope = this.byParent.get(this.scopeKey(kind, parentId));
        return scope ? Array.from(scope.values()) : [];
    }

    /** Every entry with this exact name under the parent, in insertion order. */
    findByName(kind: CatalogKind, name: string, parentId: number | null): CatalogEntry[] {
        return this.children(kind, parentId).filter(e => e.name === name);
    }

    get size(): number {
        return this.entries.size;
    }

    toJSON(): CatalogEntry[] {
        return Array.from(this.entries.values());
    }

    private key(kind: CatalogKind, name: string, parentId: number | null, schema?: string): string {
        return JSON.stringify([kind, parentId, schema ?? null, name]);
    }

    private scopeKey(kind: CatalogKind, parentId: number | null): string {
        return `${kind}:${parentId ?? 'root'}`;
    }

    private idKey(kind: CatalogKind, nativeId: number): string {
        return `${kind}:${nativeId}`;
    }
}
