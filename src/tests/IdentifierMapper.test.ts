import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UnmappedDatabaseError, UnmappedTableError } from '../errors';
import { EntityCatalog } from '../services/EntityCatalog';
import { IdentifierMapper } from '../services/IdentifierMapper';
import { sourceWarehouse, targetWarehouse } from './helpers/fixtures';

function catalogs(withCustomers = true) {
    const source = new EntityCatalog();
    source.recordMetadata(sourceWarehouse);
    const target = new EntityCatalog();
    target.recordMetadata(targetWarehouse(withCustomers));
    target.record('database', 'warehouse-staging', null, 6);
    return { source, target };
}

describe('IdentifierMapper', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('prefers by_id over by_name', () => {
        const { source, target } = catalogs();
        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: { warehouse: 6 } });
        expect(mapper.resolveDatabase(1)).toBe(5);
    });

    it('falls back to the source database name', () => {
        const { source, target } = catalogs();
        const mapper = new IdentifierMapper(source, target, { by_id: {}, by_name: { warehouse: 6 } });
        expect(mapper.resolveDatabase(1)).toBe(6);
    });

    it('rejects databases with no entry or a missing target', () => {
        const { source, target } = catalogs();
        expect(() => new IdentifierMapper(source, target, { by_id: {}, by_name: {} }).resolveDatabase(1))
            .toThrow(UnmappedDatabaseError);
        expect(() => new IdentifierMapper(source, target, { by_id: { '1': 99 }, by_name: {} }).resolveDatabase(1))
            .toThrow('Database 1 (warehouse) is not mapped: target database 99 does not exist');
    });

    it('maps tables and fields by name', () => {
        const { source, target } = catalogs();
        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: {} });

        expect(mapper.build()).toEqual([]);
        expect(mapper.mapping.lookup('database', 1)).toBe(5);
        expect(mapper.mapping.entries('table')).toEqual([[10, 50], [11, 51]]);
        expect(mapper.mapping.lookup('field', 102)).toBe(502);
        expect(mapper.mapping.lookup('field', 111)).toBe(511);
    });

    it('reports one table error for a missing table and nothing for its fields', () => {
        const { source, target } = catalogs(false);
        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: {} });

        const issues = mapper.build();
        expect(issues).toHaveLength(1);
        expect(issues[0]).toBeInstanceOf(UnmappedTableError);
        expect(issues[0]?.message).toBe("Table 'customers' (ID: 11) not found in target database 5");
        expect(mapper.unmappedEntities()).toEqual([
            {
                kind: 'table',
                sourceId: 11,
                name: 'customers',
                message: "Table 'customers' (ID: 11) not found in target database 5",
            },
        ]);
    });

    it('explains a field miss through its unmapped table', () => {
        const { source, target } = catalogs(false);
        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: {} });
        mapper.build();

        expect(mapper.explain('field', 110)).toBe(mapper.explain('table', 11));
        expect(mapper.explain('field', 100)).toBeUndefined();
        expect(mapper.describe('table', 11)).toBe('table 11 (customers)');
        expect(mapper.describe('card', 7)).toBe('card 7');
    });

    it('applies a field override even when its table is unmapped', () => {
        const { source, target } = catalogs(false);
        const mapper = new IdentifierMapper(
            source,
            target,
            { by_id: { '1': 5 }, by_name: {} },
            { fields: [{ sourceId: 111, targetId: 502 }] }
        );

        expect(mapper.build()).toHaveLength(1);
        expect(mapper.mapping.lookup('field', 111)).toBe(502);
        expect(mapper.mapping.lookup('field', 110)).toBeUndefined();
        expect(console.warn).toHaveBeenCalledWith("⚠️  Field override 111 → 502 applied while table 'customers' (ID: 11) is unmapped");
    });

    it('prefers a candidate in the same schema', () => {
        const { source } = catalogs();
        const target = new EntityCatalog();
        target.record('database', 'warehouse-prod', null, 5);
        target.record('table', 'orders', 5, 60, 'archive');
        target.record('table', 'orders', 5, 61, 'public');

        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: {} });
        mapper.build();
        expect(mapper.mapping.lookup('table', 10)).toBe(61);
    });

    it('applies overrides before name matching', () => {
        const { source, target } = catalogs(false);
        target.record('table', 'client_accounts', 5, 77, 'public');
        target.record('field', 'id', 77, 770);

        const mapper = new IdentifierMapper(source, target, { by_id: { '1': 5 }, by_name: {} }, {
            tables: [{ sourceId: 11, targetId: 77 }],
            fields: [{ sourceId: 111, targetId: 771 }],
        });

        expect(mapper.build()).toEqual([]);
        expect(mapper.mapping.lookup('table', 11)).toBe(77);
        expect(mapper.mapping.lookup('field', 110)).toBe(770);
        expect(mapper.mapping.lookup('field', 111)).toBe(771);
    });
});
