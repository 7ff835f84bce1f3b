import express, { type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { MalformedQueryError, MigrationError, MigrationErrorCode, RemapError, describeError } from './errors';
import type { ImportManager } from './services/ImportManager';
import { ManifestStore } from './services/ManifestStore';
import type { StorageService } from './services/StorageService';
import { conflictStrategySchema, type ImportReportData } from './types';

export interface AppDeps {
    exportDir: string;
    storage: StorageService;
    /** Built on first use, then reused. */
    importer: () => Promise<ImportManager>;
    store?: ManifestStore;
    previewTimeoutMs?: number;
    importTimeoutMs?: number;
}

const importRequestSchema = z.object({
    dryRun: z.boolean().default(true),
    conflict: conflictStrategySchema.default('skip'),
    includeArchived: z.boolean().default(false),
});

const overrideKindSchema = z.enum(['table', 'field']);
const overrideBodySchema = z.object({ targetId: z.number().int() });

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, timeoutMessage = 'TIMEOUT'): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
        return await Promise.race([
            promise,
            new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new Error(timeoutMessage)), timeoutMs);
            }),
        ]);
    } finally {
        clearTimeout(timer);
    }
}

function sendError(res: Response, error: unknown) {
    if (error instanceof RemapError) {
        return res.status(422).json({ error: error.message, code: error.code, path: error.path });
    }
    if (error instanceof MalformedQueryError) {
        return res.status(422).json({ error: error.message, code: error.code, path: error.path });
    }
    if (error instanceof MigrationError && error.code === MigrationErrorCode.MANIFEST_INTEGRITY) {
        return res.status(409).json({ error: error.message, code: error.code });
    }
    if (error instanceof Error && error.message === 'TIMEOUT') {
        return res.status(504).json({ error: 'Request timed out', code: 'TIMEOUT' });
    }
    console.error('Request failed:', describeError(error));
    const code = error instanceof MigrationError ? error.code : MigrationErrorCode.UNKNOWN_ERROR;
    return res.status(500).json({ error: describeError(error), code });
}

export function createApp(deps: AppDeps) {
    const app = express();
    const store = deps.store ?? new ManifestStore();
    const previewTimeoutMs = deps.previewTimeoutMs ?? 120000;
    const importTimeoutMs = deps.importTimeoutMs ?? 300000;

    let importer: Promise<ImportManager> | null = null;
    let importRunning = false;

    const getImporter = (): Promise<ImportManager> => {
        if (!importer) {
            importer = deps.importer().catch((error: unknown) => {
                // next request tries again
                importer = null;
                throw error;
            });
        }
        return importer;
    };

    app.use(cors());
    app.use(express.json());

    app.get('/api/health', (_req, res) => {
        res.json({ ok: true, storage: deps.storage.backend });
    });

    // GET /api/manifest - Summary of the export directory
    app.get('/api/manifest', async (_req, res) => {
        try {
            if ((await store.checksum(deps.exportDir)) === null) {
                return res.status(404).json({ error: `No manifest in ${deps.exportDir}` });
            }
            const manifest = await store.read(deps.exportDir);
            res.json({
                meta: manifest.meta,
                checksum: await store.checksum(deps.exportDir),
                collections: manifest.collections.length,
                cards: manifest.cards.map(c => ({ id: c.id, name: c.name, collectionId: c.collectionId, isModel: c.isModel })),
                dashboards: manifest.dashboards.map(d => ({ id: d.id, name: d.name, cardIds: d.cardIds })),
                dependencies: manifest.dependencies,
                cycles: manifest.cycles,
            });
        } catch (error) {
            sendError(res, error);
        }
    });

    // POST /api/preview/:cardId - Dry-run rewrite of one card
    app.post('/api/preview/:cardId', async (req, res) => {
        const cardId = parseInt(req.params.cardId, 10);
        if (Number.isNaN(cardId)) {
            return res.status(400).json({ error: 'cardId must be an integer' });
        }
        try {
            const manager = await getImporter();
            const preview = await withTimeout(manager.preview(cardId), previewTimeoutMs);
            if (!preview) {
                return res.status(404).json({ error: `Card ${cardId} is not in the export` });
            }
            res.json(preview);
        } catch (error) {
            sendError(res, error);
        }
    });

    // POST /api/import - Run an import (dry run unless dryRun is false)
    app.post('/api/import', async (req, res) => {
        const parsed = importRequestSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return res.status(400).json({ error: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') });
        }
        if (importRunning) {
            return res.status(409).json({ error: 'An import is already running' });
        }

        importRunning = true;
        let run: Promise<ImportReportData>;
        try {
            const manager = await getImporter();
            run = manager.run(parsed.data);
        } catch (error) {
            importRunning = false;
            return sendError(res, error);
        }

        // a timed-out response does not stop the run; the guard holds until it settles
        const release = () => {
            importRunning = false;
        };
        void run.then(release, release);
        try {
            res.json(await withTimeout(run, importTimeoutMs));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.get('/api/reports/latest', async (_req, res) => {
        try {
            const report = await deps.storage.getState('last_import_report');
            if (report === null) {
                return res.status(404).json({ error: 'No import has run yet' });
            }
            res.json(report);
        } catch (error) {
            sendError(res, error);
        }
    });

    // ======================
    // MAPPING OVERRIDES
    // ======================

    app.get('/api/overrides/:kind', async (req, res) => {
        const kind = overrideKindSchema.safeParse(req.params.kind);
        if (!kind.success) return res.status(400).json({ error: 'kind must be table or field' });
        try {
            res.json(await deps.storage.getOverrideList(kind.data));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.put('/api/overrides/:kind/:sourceId', async (req, res) => {
        const kind = overrideKindSchema.safeParse(req.params.kind);
        const body = overrideBodySchema.safeParse(req.body);
        const sourceId = parseInt(req.params.sourceId, 10);
        if (!kind.success || !body.success || Number.isNaN(sourceId)) {
            return res.status(400).json({ error: 'Expected /api/overrides/(table|field)/:sourceId with body { targetId }' });
        }
        try {
            const override = { sourceId, targetId: body.data.targetId };
            await deps.storage.saveOverride(kind.data, override);
            // mappings are rebuilt with the new override on next use
            importer = null;
            res.json(override);
        } catch (error) {
            sendError(res, error);
        }
    });

    app.delete('/api/overrides/:kind/:sourceId', async (req, res) => {
        const kind = overrideKindSchema.safeParse(req.params.kind);
        const sourceId = parseInt(req.params.sourceId, 10);
        if (!kind.success || Number.isNaN(sourceId)) {
            return res.status(400).json({ error: 'Expected /api/overrides/(table|field)/:sourceId' });
        }
        try {
            await deps.storage.deleteOverride(kind.data, sourceId);
            importer = null;
            res.status(204).end();
        } catch (error) {
            sendError(res, error);
        }
    });

    return app;
}
