import { RemapError, type IdentifierKind } from '../errors';

const KINDS: IdentifierKind[] = ['database', 'table', 'field', 'card', 'collection', 'dashboard'];

/**
 * Source id -> target id, one map per identifier kind.
 */
export class MappingTable {
    private tables = new Map<IdentifierKind, Map<number, number>>(
        KINDS.map(kind => [kind, new Map<number, number>()])
    );

    set(kind: IdentifierKind, sourceId: number, targetId: number): void {
        this.table(kind).set(sourceId, targetId);
    }

    lookup(kind: IdentifierKind, sourceId: number): number | undefined {
        return this.table(kind).get(sourceId);
    }

    has(kind: IdentifierKind, sourceId: number): boolean {
        return this.table(kind).has(sourceId);
    }

    /** Like lookup, but a miss throws. */
    require(kind: IdentifierKind, sourceId: number, path = '$'): number {
        const target = this.lookup(kind, sourceId);
        if (target === undefined) {
            throw new RemapError(path, kind, sourceId);
        }
        return target;
    }

    delete(kind: IdentifierKind, sourceId: number): void {
        this.table(kind).delete(sourceId);
    }

    entries(kind: IdentifierKind): Array<[number, number]> {
        return Array.from(this.table(kind).entries());
    }

    size(kind: IdentifierKind): number {
        return this.table(kind).size;
    }

    toJSON(): Record<IdentifierKind, Record<string, number>> {
        const out: Record<string, Record<string, number>> = {};
        for (const kind of KINDS) {
            out[kind] = Object.fromEntries(this.entries(kind).map(([s, t]) => [String(s), t]));
        }
        return {
            database: out.database,
            table: out.table,
            field: out.field,
            card: out.card,
            collection: out.collection,
            dashboard: out.dashboard,
        };
    }

    private table(kind: IdentifierKind): Map<number, number> {
        let table = this.tables.get(kind);
        if (!table) {
            table = new Map();
            this.tables.set(kind, table);
        }
        return table;
    }
}
