import path from 'path';
import fs from 'fs-extra';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ManifestIntegrityError } from '../errors';
import { ExportManager, flattenTree } from '../services/ExportManager';
import { ImportManager, buildCardPayload, parentsFirst } from '../services/ImportManager';
import { hasFailures } from '../services/ImportReport';
import { ManifestStore } from '../services/ManifestStore';
import { StorageService } from '../services/StorageService';
import type { CollectionNode, ImportReportData } from '../types';
import type { FakeMetabase } from './helpers/FakeMetabase';
import { dbMap, sourceInstance, targetInstance, tempDir } from './helpers/fixtures';

function itemOf(data: ImportReportData, entityType: 'collection' | 'card' | 'dashboard', sourceId: number) {
    return data.items.find(i => i.entityType === entityType && i.sourceId === sourceId);
}

async function exportSales(): Promise<string> {
    const exportDir = await tempDir('porter-export-');
    await new ExportManager(sourceInstance()).run({ exportDir, rootCollectionIds: [4] });
    return exportDir;
}

describe('export', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    it('exports the selected tree with every card it depends on', async () => {
        const exportDir = await tempDir('porter-export-');
        const storage = new StorageService({ baseDir: await tempDir() });
        const summary = await new ExportManager(sourceInstance(), new ManifestStore(), storage)
            .run({ exportDir, rootCollectionIds: [4] });

        expect(summary).toMatchObject({ collections: 2, cards: 4, dashboards: 1, cycles: [], missing: [] });

        const manifest = await new ManifestStore().read(exportDir);
        expect(manifest.collections).toEqual([
            { id: 4, name: 'Sales', description: 'Sales reporting', parentId: null, path: 'collections/4-sales' },
            { id: 6, name: 'Regional', description: null, parentId: 4, path: 'collections/4-sales/6-regional' },
        ]);
        expect(manifest.cards.map(c => [c.id, c.path, c.isModel])).toEqual([
            [20, 'collections/4-sales', true],
            [21, 'collections/4-sales/6-regional', false],
            [22, 'dependencies', false],
            [23, 'collections/4-sales', false],
        ]);
        expect(manifest.dashboards.map(d => [d.id, d.cardIds])).toEqual([[30, [20, 21]]]);
        expect(manifest.dependencies).toEqual([{ from: 21, to: 20 }, { from: 23, to: 22 }]);
        expect(manifest.catalog.filter(e => e.kind === 'database')).toEqual([
            { kind: 'database', name: 'warehouse', parentId: null, nativeId: 1 },
        ]);
        expect(await storage.getState('last_export')).toMatchObject({ checksum: summary.checksum, cards: 4 });
    });

    it('flattens the tree parents first, skipping personal collections', () => {
        const tree: CollectionNode[] = [
            {
                id: 'root',
                name: 'Our analytics',
                children: [
                    { id: 4, name: 'Sales', children: [{ id: 6, name: 'Regional' }] },
                    { id: 12, name: 'Personal', personal_owner_id: 3 },
                    { id: 13, name: 'Old', archived: true },
                ],
            },
        ];

        expect(flattenTree(tree, { rootIds: new Set(), includeArchived: false, includePersonal: false }).map(c => c.path))
            .toEqual(['collections/4-sales', 'collections/4-sales/6-regional']);
        expect(flattenTree(tree, { rootIds: new Set([6]), includeArchived: true, includePersonal: true }).map(c => c.id))
            .toEqual([6]);
    });
});

describe('import', () => {
    let target: FakeMetabase;
    let storage: StorageService;
    let reportDir: string;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        target = targetInstance();
        storage = new StorageService({ baseDir: await tempDir() });
        reportDir = await tempDir('porter-reports-');
    });

    function importer(exportDir: string) {
        return new ImportManager({ target, storage, exportDir, dbMap, reportDir });
    }

    it('creates everything and rewrites references between the new ids', async () => {
        const data = await importer(await exportSales()).run({ dryRun: false, conflict: 'skip' });

        expect(data.summary).toEqual({
            collections: { created: 2, updated: 0, skipped: 0, failed: 0 },
            cards: { created: 4, updated: 0, skipped: 0, failed: 0 },
            dashboards: { created: 1, updated: 0, skipped: 0, failed: 0 },
        });
        expect(data.items.map(i => [i.entityType, i.sourceId, i.targetId])).toEqual([
            ['collection', 4, 1000],
            ['collection', 6, 1001],
            ['card', 20, 1002],
            ['card', 21, 1003],
            ['card', 22, 1004],
            ['card', 23, 1005],
            ['dashboard', 30, 1006],
        ]);
        expect(itemOf(data, 'card', 22)?.warnings).toEqual(['Collection 9 was not exported; placed in the root collection']);

        expect(target.cards.get(1002)).toEqual({
            id: 1002,
            name: 'Orders base',
            collection_id: 1000,
            display: 'table',
            type: 'model',
            dataset_query: { database: 5, type: 'query', query: { 'source-table': 50 } },
            result_metadata: [{ name: 'total', id: 501, table_id: 50, field_ref: ['field', 501, null] }],
            visualization_settings: { 'table.pivot': false, column_settings: { '["ref",["field",501,null]]': {} } },
        });
        expect(target.cards.get(1003)?.dataset_query).toEqual({
            'lib/type': 'mbql/query',
            database: 5,
            stages: [
                {
                    'lib/type': 'mbql.stage/mbql',
                    'source-card': 1002,
                    joins: [
                        {
                            alias: 'C',
                            stages: [{ 'lib/type': 'mbql.stage/mbql', 'source-table': 51 }],
                            conditions: [['=', {}, ['field', {}, 'customer_id'], ['field', { 'join-alias': 'C' }, 510]]],
                        },
                    ],
                    breakout: [['field', { 'join-alias': 'C' }, 511]],
                },
            ],
        });
        expect(target.cards.get(1004)?.collection_id).toBeNull();
        expect(target.cards.get(1005)?.dataset_query).toEqual({
            database: 5,
            type: 'native',
            native: {
                query: 'select * from {{#1004-customers}} limit 10',
                'template-tags': {
                    '#1004-customers': {
                        type: 'card',
                        'card-id': 1004,
                        name: '#1004-customers',
                        'display-name': '#1004 Customers',
                        id: 'tag-1',
                    },
                },
            },
        });

        const dashboard = target.dashboards.get(1006);
        expect(dashboard?.collection_id).toBe(1000);
        expect(dashboard?.dashcards).toEqual([
            {
                id: -1,
                card_id: 1002,
                col: 0,
                row: 0,
                size_x: 6,
                size_y: 4,
                series: [],
                parameter_mappings: [{ parameter_id: 'p1', card_id: 1002, target: ['dimension', ['field', 501, null]] }],
            },
            { id: -2, card_id: 1003, col: 6, row: 0, size_x: 6, size_y: 4, series: [], parameter_mappings: [] },
        ]);
        expect(target.writes).toEqual([
            'POST /api/collection',
            'POST /api/collection',
            'POST /api/card',
            'POST /api/card',
            'POST /api/card',
            'POST /api/card',
            'POST /api/dashboard',
            'PUT /api/dashboard/1006',
        ]);
    });

    it('skips everything on a second run', async () => {
        const exportDir = await exportSales();
        await importer(exportDir).run({ dryRun: false, conflict: 'skip' });
        const writes = target.writes.length;

        const data = await importer(exportDir).run({ dryRun: false, conflict: 'skip' });

        expect(data.items.every(i => i.status === 'skipped')).toBe(true);
        expect(data.items.map(i => i.targetId)).toEqual([1000, 1001, 1002, 1003, 1004, 1005, 1006]);
        expect(target.writes).toHaveLength(writes);
    });

    it('reports unmapped metadata per card and fails dependents', async () => {
        target = targetInstance(false);
        const data = await importer(await exportSales()).run({ dryRun: true, conflict: 'skip' });

        expect(data.dryRun).toBe(true);
        expect(data.unmapped).toEqual([
            {
                kind: 'table',
                sourceId: 11,
                name: 'customers',
                message: "Table 'customers' (ID: 11) not found in target database 5",
            },
        ]);
        expect(itemOf(data, 'card', 20)).toMatchObject({ status: 'created', targetId: -20 });
        expect(itemOf(data, 'card', 21)).toMatchObject({
            status: 'failed',
            errorKind: 'UnmappedTableError',
            identifier: 'table 11 (customers)',
            path: '$.dataset_query.stages[0].joins[0].stages[0]["source-table"]',
        });
        expect(itemOf(data, 'card', 22)).toMatchObject({
            status: 'failed',
            errorKind: 'UnmappedTableError',
            path: '$.dataset_query.query["source-table"]',
        });
        expect(itemOf(data, 'card', 23)).toMatchObject({
            status: 'failed',
            errorKind: 'MissingDependencyError',
            identifier: 'card 22',
            message: 'Card 23 depends on cards that failed to import: 22',
        });
        expect(itemOf(data, 'dashboard', 30)).toMatchObject({
            status: 'created',
            targetId: -30,
            warnings: ['Skipped dashcard for card 21: card is not mapped'],
        });
        expect(target.writes).toEqual([]);
        expect(hasFailures(data)).toBe(true);
    });

    it('records archived cards as skipped', async () => {
        const source = sourceInstance();
        const customers = source.cards.get(22);
        if (!customers) throw new Error('fixture card 22 is missing');
        source.cards.set(22, { ...customers, archived: true });
        const exportDir = await tempDir('porter-export-');
        await new ExportManager(source).run({ exportDir, rootCollectionIds: [4] });

        const data = await importer(exportDir).run({ dryRun: true, conflict: 'skip' });

        expect(itemOf(data, 'card', 22)).toEqual({
            entityType: 'card',
            status: 'skipped',
            sourceId: 22,
            targetId: null,
            name: 'Customers',
            reason: 'archived',
            warnings: [],
        });
        expect(data.summary.cards).toEqual({ created: 3, updated: 0, skipped: 1, failed: 0 });
        expect(hasFailures(data)).toBe(false);
    });

    it('writes the report to disk and to storage', async () => {
        const data = await importer(await exportSales()).run({ dryRun: true, conflict: 'skip' });

        const files = (await fs.readdir(reportDir)).filter(f => f.startsWith('import_report_'));
        expect(files).toHaveLength(1);
        const saved = await fs.readJson(path.join(reportDir, files[0] ?? ''));
        expect(saved.summary).toEqual(data.summary);
        expect(await storage.getState('last_import_report')).toMatchObject({ dryRun: true, conflictStrategy: 'skip' });
    });

    it('refuses an export edited after the fact', async () => {
        const exportDir = await exportSales();
        await fs.writeJson(path.join(exportDir, 'dependencies/cards/card_22_customers.json'), { id: 22, name: 'Edited' });

        await expect(importer(exportDir).run({ dryRun: true, conflict: 'skip' })).rejects.toBeInstanceOf(ManifestIntegrityError);
    });

    it('previews a card with placeholder ids for its dependencies', async () => {
        const preview = await importer(await exportSales()).preview(21);

        expect(preview?.generation).toBe('staged');
        expect(preview?.card.dataset_query).toMatchObject({ stages: [{ 'source-card': -20 }] });
        expect(await importer(await exportSales()).preview(99)).toBeNull();
    });
});

describe('card payloads', () => {
    it('keeps only create properties', () => {
        const payload = buildCardPayload(
            {
                card: {
                    id: 20,
                    name: 'Old name',
                    display: 'line',
                    dataset: true,
                    archived: false,
                    result_metadata: [{ name: 'created_at', id: 502 }],
                    visualization_settings: { 'graph.dimensions': ['created_at'], click_behavior: { type: 'link' } },
                },
                generation: null,
                warnings: [],
            },
            'Orders base (1)',
            1000
        );

        expect(payload).toEqual({
            name: 'Orders base (1)',
            collection_id: 1000,
            display: 'line',
            dataset: true,
            result_metadata: [{ name: 'created_at', id: 502 }],
            visualization_settings: { 'graph.dimensions': ['created_at'], click_behavior: { type: 'link' } },
        });
        expect(buildCardPayload({ card: { name: 'Bare' }, generation: null, warnings: [] }, 'Bare', null))
            .toEqual({ name: 'Bare', collection_id: null, visualization_settings: {} });
    });

    it('orders collections parents first', () => {
        const ordered = parentsFirst([
            { id: 6, name: 'Regional', description: null, parentId: 4, path: 'a' },
            { id: 9, name: 'Ops', description: null, parentId: 77, path: 'b' },
            { id: 4, name: 'Sales', description: null, parentId: null, path: 'c' },
        ]);
        expect(ordered.map(c => c.id)).toEqual([9, 4, 6]);
    });
});
