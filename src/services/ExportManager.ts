import { DashboardRewriter } from './DashboardRewriter';
import { DependencyResolver } from './DependencyResolver';
import { EntityCatalog } from './EntityCatalog';
import { ManifestStore, slugify } from './ManifestStore';
import { isNotFound, type MetabaseApi } from './MetabaseClient';
import type { StorageService } from './StorageService';
import { isInteger, isJsonObject, type JsonObject } from '../lib/json';
import {
    cardHeaderSchema,
    dashboardHeaderSchema,
    type CollectionNode,
    type Manifest,
    type ManifestCard,
    type ManifestCollection,
    type ManifestDashboard
} from '../types';

export const TOOL_VERSION = '1.0.0';

/** Body path for cards pulled in only because exported content depends on them. */
export const DEPENDENCIES_PATH = 'dependencies';
const ROOT_PATH = 'root';

const CARD_MODELS = new Set(['card', 'dataset', 'metric']);

export interface ExportOptions {
    exportDir: string;
    /** Export only these collections and their descendants; everything when empty. */
    rootCollectionIds?: number[];
    includeArchived?: boolean;
    includeDashboards?: boolean;
    includePersonal?: boolean;
}

export interface ExportSummary {
    exportDir: string;
    checksum: string;
    collections: number;
    cards: number;
    dashboards: number;
    cycles: string[];
    missing: number[];
}

export class ExportManager {
    private cards = new Map<number, JsonObject>();

    constructor(
        private source: MetabaseApi,
        private store: ManifestStore = new ManifestStore(),
        private storage?: StorageService
    ) {}

    async run(options: ExportOptions): Promise<ExportSummary> {
        const includeArchived = options.includeArchived ?? false;
        const includeDashboards = options.includeDashboards ?? true;
        const rootIds = new Set(options.rootCollectionIds ?? []);
        this.cards.clear();

        console.log(`\n=== Exporting from ${this.source.baseUrl} ===`);

        // ======================
        // COLLECTIONS
        // ======================
        const tree = await this.source.getCollectionsTree(includeArchived);
        const collections = flattenTree(tree, {
            rootIds,
            includeArchived,
            includePersonal: options.includePersonal ?? false,
        });
        console.log(`Found ${collections.length} collections to export`);

        const containers: Array<{ id: number | 'root'; path: string }> = collections.map(c => ({ id: c.id, path: c.path }));
        if (rootIds.size === 0) {
            containers.unshift({ id: 'root', path: ROOT_PATH });
        }

        const rootCards: number[] = [];
        const dashboardIds: Array<{ id: number; path: string }> = [];
        for (const container of containers) {
            const items = await this.source.getCollectionItems(container.id);
            for (const item of items) {
                if (CARD_MODELS.has(item.model)) rootCards.push(item.id);
                if (item.model === 'dashboard' && includeDashboards) dashboardIds.push({ id: item.id, path: container.path });
            }
        }

        // ======================
        // DASHBOARDS
        // ======================
        const dashboards: ManifestDashboard[] = [];
        for (const { id, path } of dashboardIds) {
            const body = await this.source.getDashboard(id);
            const header = dashboardHeaderSchema.parse(body);
            if (header.archived && !includeArchived) continue;

            const cardIds = DashboardRewriter.referencedCards(body);
            rootCards.push(...cardIds);
            dashboards.push({
                id: header.id,
                name: header.name,
                collectionId: header.collection_id ?? null,
                archived: header.archived ?? false,
                cardIds,
                path,
                body,
            });
            console.log(`Fetched dashboard: ${header.name} (ID: ${header.id})`);
        }

        // ======================
        // CARDS AND DEPENDENCIES
        // ======================
        const resolution = await new DependencyResolver().resolve(
            Array.from(new Set(rootCards)),
            id => this.loadCard(id)
        );
        for (const id of resolution.missing) {
            console.warn(`⚠️  Card ${id} is referenced but could not be fetched; dependents will fail on import`);
        }

        const collectionPaths = new Map(collections.map(c => [c.id, c.path]));
        const cards: ManifestCard[] = [];
        const databaseIds = new Set<number>();
        for (const id of resolution.order) {
            const body = this.cards.get(id);
            if (!body) continue;
            const header = cardHeaderSchema.parse(body);
            const collectionId = header.collection_id ?? null;
            const path = collectionId === null
                ? (rootIds.size === 0 ? ROOT_PATH : DEPENDENCIES_PATH)
                : collectionPaths.get(collectionId) ?? DEPENDENCIES_PATH;

            const queryDatabase = header.dataset_query?.database;
            const databaseId = header.database_id ?? (isInteger(queryDatabase) ? queryDatabase : null);
            if (databaseId !== null) databaseIds.add(databaseId);

            cards.push({
                id,
                name: header.name,
                collectionId,
                databaseId,
                archived: header.archived ?? false,
                isModel: header.type === 'model' || header.dataset === true,
                path,
                body,
            });
        }

        // ======================
        // METADATA
        // ======================
        const catalog = new EntityCatalog();
        const known = new Set((await this.source.getDatabases()).map(db => db.id));
        for (const databaseId of Array.from(databaseIds).sort((a, b) => a - b)) {
            if (!known.has(databaseId)) {
                console.warn(`⚠️  Database ${databaseId} used by exported cards is not visible on the source`);
                continue;
            }
            catalog.recordMetadata(await this.source.getDatabaseMetadata(databaseId));
        }

        const manifest: Manifest = {
            meta: {
                sourceUrl: this.source.baseUrl,
                exportedAt: new Date().toISOString(),
                toolVersion: TOOL_VERSION,
                options: {
                    rootCollectionIds: Array.from(rootIds),
                    includeArchived,
                    includeDashboards,
                },
            },
            catalog: catalog.toJSON(),
            collections,
            cards,
            dashboards,
            dependencies: resolution.graph.edges(),
            cycles: resolution.cycles.map(c => c.message),
        };
        const checksum = await this.store.write(manifest, options.exportDir);

        const summary: ExportSummary = {
            exportDir: options.exportDir,
            checksum,
            collections: collections.length,
            cards: cards.length,
            dashboards: dashboards.length,
            cycles: manifest.cycles,
            missing: resolution.missing,
        };
        if (this.storage) {
            await this.storage.setState('last_export', {
                exportDir: summary.exportDir,
                checksum,
                collections: summary.collections,
                cards: summary.cards,
                dashboards: summary.dashboards,
                cycles: [...summary.cycles],
                missing: [...summary.missing],
            });
        }
        return summary;
    }

    private async loadCard(cardId: number): Promise<JsonObject | null> {
        let body = this.cards.get(cardId);
        if (!body) {
            try {
                body = await this.source.getCard(cardId);
            } catch (error) {
                if (isNotFound(error)) return null;
                throw error;
            }
            this.cards.set(cardId, body);
            console.log(`Fetched card: ${String(body.name)} (ID: ${cardId})`);
        }
        const query = body.dataset_query;
        return isJsonObject(query) ? query : {};
    }
}

interface FlattenOptions {
    rootIds: Set<number>;
    includeArchived: boolean;
    includePersonal: boolean;
}

/** Depth-first, parents before children. */
export function flattenTree(nodes: CollectionNode[], options: FlattenOptions): ManifestCollection[] {
    const out: ManifestCollection[] = [];

    const walk = (children: CollectionNode[], parent: ManifestCollection | null, inSelection: boolean) => {
        for (const node of children) {
            if (node.id === 'root') {
                walk(node.children ?? [], null, inSelection);
                continue;
            }
            if (node.personal_owner_id != null && !options.includePersonal) continue;
            if (node.archived && !options.includeArchived) continue;

            const selected = inSelection || options.rootIds.size === 0 || options.rootIds.has(node.id);
            let entry: ManifestCollection | null = null;
            if (selected) {
                entry = {
                    id: node.id,
                    name: node.name,
                    description: node.description ?? null,
                    parentId: parent?.id ?? null,
                    path: `${parent ? parent.path : 'collections'}/${node.id}-${slugify(node.name)}`,
                };
                out.push(entry);
            }
            walk(node.children ?? [], entry, selected);
        }
    };

    walk(nodes, null, false);
    return out;
}
