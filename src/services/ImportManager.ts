import { CollectionItemsIndex, type ItemModel } from './ConflictResolver';
import { DashboardRewriter } from './DashboardRewriter';
import { DependencyResolver, type Resolution } from './DependencyResolver';
import { EntityCatalog } from './EntityCatalog';
import { IdentifierMapper } from './IdentifierMapper';
import { ImportReport, writeReport } from './ImportReport';
import { ManifestStore } from './ManifestStore';
import type { MetabaseApi } from './MetabaseClient';
import { QueryRewriter, type CardRewriteResult } from './QueryRewriter';
import type { StorageService } from './StorageService';
import { MissingDependencyError, RemapError, isFatal } from '../errors';
import { isJsonObject, jsonObjectSchema, type JsonObject } from '../lib/json';
import type {
    ConflictStrategy,
    DatabaseMap,
    ImportReportData,
    Manifest,
    ManifestCard,
    ManifestCollection,
    ManifestDashboard
} from '../types';

export interface ImportOptions {
    dryRun: boolean;
    conflict: ConflictStrategy;
    includeArchived?: boolean;
}

export interface ImportManagerDeps {
    target: MetabaseApi;
    storage: StorageService;
    exportDir: string;
    dbMap: DatabaseMap;
    store?: ManifestStore;
    /** Where the report file goes; the export directory by default. */
    reportDir?: string;
}

export interface CardPreview {
    card: JsonObject;
    generation: string | null;
    warnings: string[];
}

/** Card properties sent on create and update. */
const CARD_KEYS = ['description', 'display', 'dataset_query', 'result_metadata', 'collection_position', 'cache_ttl', 'type'];

interface ImportContext {
    manifest: Manifest;
    mapper: IdentifierMapper;
    rewriter: QueryRewriter;
}

/** What one run carries from item to item. */
interface RunState {
    mapper: IdentifierMapper;
    rewriter: QueryRewriter;
    items: CollectionItemsIndex;
    options: ImportOptions;
    report: ImportReport;
    /** Source ids of the exported collections. */
    exported: Set<number>;
}

export class ImportManager {
    private store: ManifestStore;

    constructor(private deps: ImportManagerDeps) {
        this.store = deps.store ?? new ManifestStore();
    }

    async run(options: ImportOptions): Promise<ImportReportData> {
        const { target } = this.deps;
        const report = new ImportReport(options.dryRun, options.conflict);
        console.log(`\n=== Importing into ${target.baseUrl}${options.dryRun ? ' (dry run)' : ''} ===`);

        const { manifest, mapper, rewriter } = await this.prepare();
        report.setUnmapped(mapper.unmappedEntities());
        report.addCycles(manifest.cycles);

        const state: RunState = {
            mapper,
            rewriter,
            items: new CollectionItemsIndex(target),
            options,
            report,
            exported: new Set(manifest.collections.map(c => c.id)),
        };

        // ======================
        // COLLECTIONS
        // ======================
        for (const collection of parentsFirst(manifest.collections)) {
            try {
                await this.importCollection(collection, state);
            } catch (error) {
                if (isFatal(error)) throw error;
                report.failed('collection', { sourceId: collection.id, name: collection.name }, error);
            }
        }

        // ======================
        // CARDS
        // ======================
        const cards = new Map(manifest.cards.map(c => [c.id, c]));
        const resolution = await this.resolveOrder(manifest);
        report.addCycles(resolution.cycles.map(c => c.message));

        for (const id of resolution.order) {
            const card = cards.get(id);
            if (!card) continue;
            if (card.archived && !options.includeArchived) {
                report.skipped('card', { sourceId: card.id, name: card.name }, 'archived');
                continue;
            }

            try {
                await this.importCard(card, resolution, state);
            } catch (error) {
                if (isFatal(error)) throw error;
                report.failed('card', { sourceId: card.id, name: card.name }, error);
            }
        }

        // ======================
        // DASHBOARDS
        // ======================
        const dashboards = new DashboardRewriter(mapper.mapping, rewriter);
        for (const dashboard of manifest.dashboards) {
            if (dashboard.archived && !options.includeArchived) {
                report.skipped('dashboard', { sourceId: dashboard.id, name: dashboard.name }, 'archived');
                continue;
            }
            try {
                await this.importDashboard(dashboard, dashboards, state);
            } catch (error) {
                if (isFatal(error)) throw error;
                report.failed('dashboard', { sourceId: dashboard.id, name: dashboard.name }, error);
            }
        }

        const data = report.finish();
        const reportPath = await writeReport(data, this.deps.reportDir ?? this.deps.exportDir);
        console.log(`Report saved to ${reportPath}`);
        await this.deps.storage.setState('last_import_report', reportToJson(data));
        return data;
    }

    /**
     * Dry-run rewrite of one manifest card. Other manifest cards and collections get
     * placeholder ids (negated source ids) so references between them resolve.
     */
    async preview(cardId: number): Promise<CardPreview | null> {
        const { manifest, mapper, rewriter } = await this.prepare();
        const card = manifest.cards.find(c => c.id === cardId);
        if (!card) return null;

        for (const collection of manifest.collections) mapper.mapping.set('collection', collection.id, -collection.id);
        for (const other of manifest.cards) mapper.setCardMapping(other.id, -other.id);

        const result = rewriter.rewriteCard(card.body);
        return { card: result.card, generation: result.generation, warnings: result.warnings };
    }

    private async prepare(): Promise<ImportContext> {
        const manifest = await this.store.read(this.deps.exportDir);

        const source = EntityCatalog.fromEntries(manifest.catalog);
        const target = await this.targetCatalog();
        const overrides = await this.deps.storage.getOverrides();

        const mapper = new IdentifierMapper(source, target, this.deps.dbMap, overrides);
        mapper.build();
        return { manifest, mapper, rewriter: new QueryRewriter(mapper.mapping, mapper) };
    }

    private async targetCatalog(): Promise<EntityCatalog> {
        const catalog = new EntityCatalog();
        const databases = await this.deps.target.getDatabases();
        for (const db of databases) catalog.recordDatabase(db);

        const wanted = new Set([...Object.values(this.deps.dbMap.by_id), ...Object.values(this.deps.dbMap.by_name)]);
        for (const db of databases) {
            if (wanted.has(db.id)) {
                catalog.recordMetadata(await this.deps.target.getDatabaseMetadata(db.id));
            }
        }
        return catalog;
    }

    private resolveOrder(manifest: Manifest): Promise<Resolution> {
        const bodies = new Map(manifest.cards.map(c => [c.id, c.body]));
        return new DependencyResolver().resolve(manifest.cards.map(c => c.id), id => {
            const body = bodies.get(id);
            if (!body) return null;
            return isJsonObject(body.dataset_query) ? body.dataset_query : {};
        });
    }

    private async importCollection(collection: ManifestCollection, state: RunState) {
        const { mapper, items, options, report, exported } = state;
        let parentId: number | null = null;
        if (collection.parentId !== null && exported.has(collection.parentId)) {
            const mappedParent = mapper.mapping.lookup('collection', collection.parentId);
            if (mappedParent === undefined) {
                throw new RemapError('$.parent_id', 'collection', collection.parentId);
            }
            parentId = mappedParent;
        }

        const outcome = await items.decide(collection.name, parentId, 'collection', options.conflict);
        const ref = { sourceId: collection.id, name: outcome.name };
        if (outcome.action === 'skip') {
            mapper.mapping.set('collection', collection.id, outcome.targetId);
            report.succeeded('collection', 'skipped', { ...ref, targetId: outcome.targetId });
            return;
        }

        const payload: JsonObject = { name: outcome.name, description: collection.description, parent_id: parentId };
        if (outcome.action === 'update') {
            if (!options.dryRun) await this.deps.target.updateCollection(outcome.targetId, payload);
            mapper.mapping.set('collection', collection.id, outcome.targetId);
            report.succeeded('collection', 'updated', { ...ref, targetId: outcome.targetId });
            return;
        }

        const targetId = options.dryRun ? -collection.id : (await this.deps.target.createCollection(payload)).id;
        await items.remember(parentId, { id: targetId, name: outcome.name, model: 'collection' });
        mapper.mapping.set('collection', collection.id, targetId);
        report.succeeded('collection', 'created', { ...ref, targetId });
        console.log(`  ✓ Collection '${outcome.name}' → ${targetId}`);
    }

    private async importCard(card: ManifestCard, resolution: Resolution, state: RunState) {
        const { mapper, rewriter, items, options, report } = state;
        const dependencies = resolution.graph.dependenciesOf(card.id);
        const missing = dependencies.filter(d => resolution.missing.includes(d));
        if (missing.length > 0) {
            throw new MissingDependencyError(card.id, missing);
        }
        const failedDeps = dependencies.filter(d => report.statusOf('card', d) === 'failed');
        if (failedDeps.length > 0) {
            throw new MissingDependencyError(card.id, failedDeps, 'that failed to import');
        }

        const warnings: string[] = [];
        const collectionId = this.placement(card.collectionId, state, warnings);
        const outcome = await items.decide(card.name, collectionId, cardModels(card), options.conflict);
        if (outcome.action === 'skip') {
            mapper.setCardMapping(card.id, outcome.targetId);
            report.succeeded('card', 'skipped', { sourceId: card.id, name: outcome.name, targetId: outcome.targetId }, warnings);
            return;
        }

        const rewritten = rewriter.rewriteCard(card.body);
        warnings.push(...rewritten.warnings);
        const payload = buildCardPayload(rewritten, outcome.name, collectionId);

        let targetId: number;
        if (outcome.action === 'update') {
            targetId = outcome.targetId;
            if (!options.dryRun) await this.deps.target.updateCard(targetId, payload);
        } else {
            targetId = options.dryRun ? -card.id : (await this.deps.target.createCard(payload)).id;
            await items.remember(collectionId, { id: targetId, name: outcome.name, model: cardModel(card) });
        }

        mapper.setCardMapping(card.id, targetId);
        const status = outcome.action === 'update' ? 'updated' : 'created';
        report.succeeded('card', status, { sourceId: card.id, name: outcome.name, targetId }, warnings);
        console.log(`  ✓ ${status === 'updated' ? 'Updated' : 'Created'} card '${outcome.name}' (${card.id} → ${targetId})`);
    }

    private async importDashboard(dashboard: ManifestDashboard, rewriter: DashboardRewriter, state: RunState) {
        const { mapper, items, options, report } = state;
        let collectionId: number | null = null;
        if (dashboard.collectionId !== null) {
            const mapped = mapper.mapping.lookup('collection', dashboard.collectionId);
            if (mapped === undefined) {
                throw new RemapError('$.collection_id', 'collection', dashboard.collectionId);
            }
            collectionId = mapped;
        }

        const outcome = await items.decide(dashboard.name, collectionId, 'dashboard', options.conflict);
        if (outcome.action === 'skip') {
            mapper.mapping.set('dashboard', dashboard.id, outcome.targetId);
            report.succeeded('dashboard', 'skipped', { sourceId: dashboard.id, name: outcome.name, targetId: outcome.targetId });
            return;
        }

        const result = rewriter.rewrite(dashboard.body);
        const properties: JsonObject = { ...result.dashboard, name: outcome.name, collection_id: collectionId };
        const layout: JsonObject = { dashcards: result.dashcards, tabs: result.tabs };

        let targetId: number;
        if (outcome.action === 'update') {
            targetId = outcome.targetId;
            if (!options.dryRun) await this.deps.target.updateDashboard(targetId, { ...properties, ...layout });
        } else if (options.dryRun) {
            targetId = -dashboard.id;
        } else {
            targetId = (await this.deps.target.createDashboard(properties)).id;
            await this.deps.target.updateDashboard(targetId, layout);
        }
        if (outcome.action === 'create') {
            await items.remember(collectionId, { id: targetId, name: outcome.name, model: 'dashboard' });
        }

        mapper.mapping.set('dashboard', dashboard.id, targetId);
        const status = outcome.action === 'update' ? 'updated' : 'created';
        report.succeeded('dashboard', status, { sourceId: dashboard.id, name: outcome.name, targetId }, result.warnings);
        console.log(`  ✓ ${status === 'updated' ? 'Updated' : 'Created'} dashboard '${outcome.name}' (${dashboard.id} → ${targetId})`);
    }

    /**
     * Target collection for a card. Cards pulled in from collections outside the export
     * land in the root collection.
     */
    private placement(sourceCollectionId: number | null, state: RunState, warnings: string[]): number | null {
        if (sourceCollectionId === null) return null;
        if (!state.exported.has(sourceCollectionId)) {
            warnings.push(`Collection ${sourceCollectionId} was not exported; placed in the root collection`);
            return null;
        }
        const mapped = state.mapper.mapping.lookup('collection', sourceCollectionId);
        if (mapped === undefined) {
            throw new RemapError('$.collection_id', 'collection', sourceCollectionId);
        }
        return mapped;
    }
}

function cardModel(card: ManifestCard): ItemModel {
    if (card.isModel) return 'dataset';
    return card.body.type === 'metric' ? 'metric' : 'card';
}

/** Older platforms list models as `card` with a dataset flag. */
function cardModels(card: ManifestCard): ItemModel[] {
    return card.isModel ? ['dataset', 'card'] : [cardModel(card)];
}

/** Parents before children; collections whose parent is not exported come first. */
export function parentsFirst(collections: ManifestCollection[]): ManifestCollection[] {
    const ids = new Set(collections.map(c => c.id));
    const byParent = new Map<number | null, ManifestCollection[]>();
    for (const collection of collections) {
        const parent = collection.parentId !== null && ids.has(collection.parentId) ? collection.parentId : null;
        const siblings = byParent.get(parent) ?? [];
        siblings.push(collection);
        byParent.set(parent, siblings);
    }

    const out: ManifestCollection[] = [];
    const visit = (parent: number | null) => {
        for (const child of byParent.get(parent) ?? []) {
            out.push(child);
            visit(child.id);
        }
    };
    visit(null);
    return out;
}

export function buildCardPayload(rewritten: CardRewriteResult, name: string, collectionId: number | null): JsonObject {
    const card = rewritten.card;
    const payload: JsonObject = { name, collection_id: collectionId };
    for (const key of CARD_KEYS) {
        const value = card[key];
        if (value !== undefined) payload[key] = value;
    }
    if (card.dataset === true) payload.dataset = true;
    payload.visualization_settings = isJsonObject(card.visualization_settings) ? card.visualization_settings : {};
    return payload;
}

function reportToJson(data: ImportReportData): JsonObject {
    return jsonObjectSchema.parse(JSON.parse(JSON.stringify(data)));
}
