import { z } from 'zod';
import { jsonObjectSchema, type JsonObject } from './lib/json';

export type ConflictStrategy = 'skip' | 'overwrite' | 'rename';
export const conflictStrategySchema = z.enum(['skip', 'overwrite', 'rename']);

export const databaseMapSchema = z.object({
    by_id: z.record(z.number().int()).default({}),
    by_name: z.record(z.number().int()).default({}),
});
export type DatabaseMap = z.infer<typeof databaseMapSchema>;

// ======================
// ENTITY CATALOG
// ======================

export type CatalogKind = 'database' | 'table' | 'field';

export const catalogEntrySchema = z.object({
    kind: z.enum(['database', 'table', 'field']),
    name: z.string(),
    parentId: z.number().int().nullable(),
    nativeId: z.number().int(),
    schema: z.string().optional(),
});
export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

// ======================
// METABASE API SHAPES
// ======================

export const databaseSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    engine: z.string().optional(),
});
export type DatabaseSummary = z.infer<typeof databaseSchema>;

export const databaseListSchema = z.union([
    z.array(databaseSchema),
    z.object({ data: z.array(databaseSchema) }).transform(r => r.data),
]);

export const fieldMetadataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    display_name: z.string().nullish(),
    base_type: z.string().nullish(),
    table_id: z.number().int().nullish(),
});
export type FieldMetadata = z.infer<typeof fieldMetadataSchema>;

export const tableMetadataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    schema: z.string().nullish(),
    display_name: z.string().nullish(),
    fields: z.array(fieldMetadataSchema).default([]),
});
export type TableMetadata = z.infer<typeof tableMetadataSchema>;

export const databaseMetadataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    tables: z.array(tableMetadataSchema).default([]),
});
export type DatabaseMetadata = z.infer<typeof databaseMetadataSchema>;

export interface CollectionNode {
    id: number | 'root';
    name: string;
    description?: string | null;
    slug?: string | null;
    location?: string | null;
    personal_owner_id?: number | null;
    archived?: boolean;
    children?: CollectionNode[];
}

export const collectionNodeSchema: z.ZodType<CollectionNode> = z.lazy(() =>
    z.object({
        id: z.union([z.number().int(), z.literal('root')]),
        name: z.string(),
        description: z.string().nullish(),
        slug: z.string().nullish(),
        location: z.string().nullish(),
        personal_owner_id: z.number().int().nullish(),
        archived: z.boolean().optional(),
        children: z.array(collectionNodeSchema).optional(),
    })
);

export const collectionItemSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    model: z.string(),
});
export type CollectionItem = z.infer<typeof collectionItemSchema>;

export const collectionItemsSchema = z.union([
    z.array(collectionItemSchema),
    z.object({ data: z.array(collectionItemSchema) }).transform(r => r.data),
]);

export const createdEntitySchema = z.object({
    id: z.number().int(),
    name: z.string().optional(),
});
export type CreatedEntity = z.infer<typeof createdEntitySchema>;

/** The handful of card properties the migration logic reads; the full body travels as JSON. */
export const cardHeaderSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    collection_id: z.number().int().nullish(),
    database_id: z.number().int().nullish(),
    archived: z.boolean().optional(),
    type: z.string().nullish(),
    dataset: z.boolean().optional(),
    dataset_query: jsonObjectSchema.nullish(),
});

export const dashboardHeaderSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    collection_id: z.number().int().nullish(),
    archived: z.boolean().optional(),
});

// ======================
// MANIFEST
// ======================

export interface ManifestMeta {
    sourceUrl: string;
    exportedAt: string;
    toolVersion: string;
    options: JsonObject;
}

export interface ManifestCollection {
    id: number;
    name: string;
    description: string | null;
    parentId: number | null;
    path: string;
}

export interface ManifestCard {
    id: number;
    name: string;
    collectionId: number | null;
    databaseId: number | null;
    archived: boolean;
    isModel: boolean;
    /** Collection path the body is stored under; `dependencies` for cards pulled in from outside. */
    path: string;
    body: JsonObject;
}

export interface ManifestDashboard {
    id: number;
    name: string;
    collectionId: number | null;
    archived: boolean;
    cardIds: number[];
    path: string;
    body: JsonObject;
}

export interface DependencyEdge {
    from: number;
    to: number;
}

export interface Manifest {
    meta: ManifestMeta;
    catalog: CatalogEntry[];
    collections: ManifestCollection[];
    cards: ManifestCard[];
    dashboards: ManifestDashboard[];
    dependencies: DependencyEdge[];
    cycles: string[];
}

// ======================
// IMPORT REPORT
// ======================

export type ReportEntityType = 'collection' | 'card' | 'dashboard';
export type ReportStatus = 'created' | 'updated' | 'skipped' | 'failed';

export interface ImportReportItem {
    entityType: ReportEntityType;
    status: ReportStatus;
    sourceId: number;
    targetId: number | null;
    name: string;
    errorKind?: string;
    identifier?: string;
    path?: string;
    message?: string;
    /** Why an item was skipped without looking at the target, e.g. `archived`. */
    reason?: string;
    warnings: string[];
}

export interface UnmappedEntity {
    kind: 'database' | 'table' | 'field';
    sourceId: number;
    name: string;
    message: string;
}

export type ReportCounts = Record<ReportStatus, number>;

export interface ImportReportData {
    dryRun: boolean;
    conflictStrategy: ConflictStrategy;
    startedAt: string;
    finishedAt: string | null;
    summary: Record<'collections' | 'cards' | 'dashboards', ReportCounts>;
    items: ImportReportItem[];
    unmapped: UnmappedEntity[];
    cycles: string[];
}
