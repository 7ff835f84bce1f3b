import { once } from 'events';
import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp, type AppDeps } from '../app';
import { ExportManager } from '../services/ExportManager';
import { ImportManager } from '../services/ImportManager';
import { StorageService } from '../services/StorageService';
import type { ImportReportData } from '../types';
import { dbMap, sourceInstance, targetInstance, tempDir } from './helpers/fixtures';

async function serve(deps: AppDeps): Promise<{ http: AxiosInstance; server: Server }> {
    const server = createApp(deps).listen(0);
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    const http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    return { http, server };
}

describe('HTTP API', () => {
    let http: AxiosInstance;
    let server: Server;
    let storage: StorageService;

    beforeAll(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});

        const exportDir = await tempDir('porter-export-');
        await new ExportManager(sourceInstance()).run({ exportDir, rootCollectionIds: [4] });
        storage = new StorageService({ baseDir: await tempDir() });
        const reportDir = await tempDir('porter-reports-');

        ({ http, server } = await serve({
            exportDir,
            storage,
            importer: async () => new ImportManager({ target: targetInstance(), storage, exportDir, dbMap, reportDir }),
        }));
    });

    afterAll(() => {
        server.closeAllConnections();
        server.close();
        vi.restoreAllMocks();
    });

    it('reports health and the storage backend', async () => {
        const res = await http.get('/api/health');
        expect(res.status).toBe(200);
        expect(res.data).toEqual({ ok: true, storage: 'file' });
    });

    it('summarises the manifest', async () => {
        const res = await http.get('/api/manifest');
        expect(res.status).toBe(200);
        expect(res.data.collections).toBe(2);
        expect(res.data.cards).toEqual([
            { id: 20, name: 'Orders base', collectionId: 4, isModel: true },
            { id: 21, name: 'Revenue by region', collectionId: 6, isModel: false },
            { id: 22, name: 'Customers', collectionId: 9, isModel: false },
            { id: 23, name: 'Top customers SQL', collectionId: 4, isModel: false },
        ]);
        expect(res.data.dependencies).toEqual([{ from: 21, to: 20 }, { from: 23, to: 22 }]);
    });

    it('previews one card', async () => {
        const res = await http.post('/api/preview/20');
        expect(res.status).toBe(200);
        expect(res.data.generation).toBe('legacy');
        expect(res.data.card.dataset_query).toEqual({ database: 5, type: 'query', query: { 'source-table': 50 } });

        expect((await http.post('/api/preview/999')).status).toBe(404);
        expect((await http.post('/api/preview/abc')).status).toBe(400);
    });

    it('validates import requests', async () => {
        const res = await http.post('/api/import', { conflict: 'merge' });
        expect(res.status).toBe(400);
    });

    it('runs a dry-run import and serves the latest report', async () => {
        expect((await http.get('/api/reports/latest')).status).toBe(404);

        const run = await http.post('/api/import', {});
        expect(run.status).toBe(200);
        expect(run.data.dryRun).toBe(true);
        expect(run.data.summary.cards).toEqual({ created: 4, updated: 0, skipped: 0, failed: 0 });

        const latest = await http.get('/api/reports/latest');
        expect(latest.status).toBe(200);
        expect(latest.data.summary).toEqual(run.data.summary);
    });

    it('manages mapping overrides', async () => {
        const put = await http.put('/api/overrides/table/11', { targetId: 77 });
        expect(put.status).toBe(200);
        expect(put.data).toEqual({ sourceId: 11, targetId: 77 });
        expect((await http.get('/api/overrides/table')).data).toEqual([{ sourceId: 11, targetId: 77 }]);

        expect((await http.delete('/api/overrides/table/11')).status).toBe(204);
        expect((await http.get('/api/overrides/table')).data).toEqual([]);
        expect((await http.put('/api/overrides/schema/1', { targetId: 2 })).status).toBe(400);
    });
});

describe('HTTP API without an export', () => {
    it('answers 404 for the manifest', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const exportDir = await tempDir('porter-empty-');
        const { http, server } = await serve({
            exportDir,
            storage: new StorageService({ baseDir: exportDir }),
            importer: () => Promise.reject(new Error('not used')),
        });

        try {
            const res = await http.get('/api/manifest');
            expect(res.status).toBe(404);
            expect(res.data).toEqual({ error: `No manifest in ${exportDir}` });
        } finally {
            server.closeAllConnections();
            server.close();
        }
    });
});

describe('HTTP API import guard', () => {
    it('refuses a second import until a timed-out run settles', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});

        const counts = { created: 0, updated: 0, skipped: 0, failed: 0 };
        const report: ImportReportData = {
            dryRun: true,
            conflictStrategy: 'skip',
            startedAt: '2026-01-01T00:00:00.000Z',
            finishedAt: '2026-01-01T00:00:01.000Z',
            summary: { collections: counts, cards: counts, dashboards: counts },
            items: [],
            unmapped: [],
            cycles: [],
        };
        let finish: (data: ImportReportData) => void = () => {};
        const pending = new Promise<ImportReportData>(resolve => {
            finish = resolve;
        });
        class SlowImportManager extends ImportManager {
            run(): Promise<ImportReportData> {
                return pending;
            }
        }

        const exportDir = await tempDir('porter-slow-');
        const storage = new StorageService({ baseDir: exportDir });
        const manager = new SlowImportManager({ target: targetInstance(), storage, exportDir, dbMap });
        const { http, server } = await serve({ exportDir, storage, importer: async () => manager, importTimeoutMs: 20 });

        try {
            expect((await http.post('/api/import', {})).status).toBe(504);
            const second = await http.post('/api/import', {});
            expect(second.status).toBe(409);
            expect(second.data).toEqual({ error: 'An import is already running' });

            finish(report);
            await pending;
            const third = await http.post('/api/import', {});
            expect(third.status).toBe(200);
            expect(third.data).toEqual(report);
        } finally {
            server.closeAllConnections();
            server.close();
            vi.restoreAllMocks();
        }
    });
});
