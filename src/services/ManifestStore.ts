import crypto from 'crypto';
import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ManifestIntegrityError, MigrationError, MigrationErrorCode } from '../errors';
import { canonicalStringify, jsonObjectSchema, type JsonObject, type JsonValue } from '../lib/json';
import { catalogEntrySchema, type CatalogEntry, type Manifest, type ManifestCard, type ManifestDashboard } from '../types';

export const MANIFEST_FILE = 'manifest.json';
const FORMAT_VERSION = 1;

const fileRefSchema = z.object({
    file: z.string(),
    checksum: z.string(),
});

const manifestFileSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    meta: z.object({
        sourceUrl: z.string(),
        exportedAt: z.string(),
        toolVersion: z.string(),
        options: jsonObjectSchema,
    }),
    catalog: z.array(catalogEntrySchema),
    collections: z.array(z.object({
        id: z.number().int(),
        name: z.string(),
        description: z.string().nullable(),
        parentId: z.number().int().nullable(),
        path: z.string(),
    })),
    cards: z.array(fileRefSchema.extend({
        id: z.number().int(),
        name: z.string(),
        collectionId: z.number().int().nullable(),
        databaseId: z.number().int().nullable(),
        archived: z.boolean(),
        isModel: z.boolean(),
        path: z.string(),
    })),
    dashboards: z.array(fileRefSchema.extend({
        id: z.number().int(),
        name: z.string(),
        collectionId: z.number().int().nullable(),
        archived: z.boolean(),
        cardIds: z.array(z.number().int()),
        path: z.string(),
    })),
    dependencies: z.array(z.object({ from: z.number().int(), to: z.number().int() })),
    cycles: z.array(z.string()),
    checksum: z.string(),
});

export function checksumOf(value: JsonValue): string {
    return crypto.createHash('sha256').update(canonicalStringify(value)).digest('hex');
}

function catalogEntryToJson(entry: CatalogEntry): JsonObject {
    const { kind, name, parentId, nativeId, schema } = entry;
    return schema === undefined ? { kind, name, parentId, nativeId } : { kind, name, parentId, nativeId, schema };
}

export function slugify(name: string): string {
    const slug = name
        .toLowerCase()
        .normalize('NFKD')
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 60)
        .replace(/-+$/, '');
    return slug || 'item';
}

/**
 * Export directory layout: `manifest.json` at the root, each card and dashboard body
 * in its own file under the path of the collection it was exported from.
 */
export class ManifestStore {
    async write(manifest: Manifest, dir: string): Promise<string> {
        await fs.ensureDir(dir);

        const cards: JsonValue[] = [];
        for (const card of manifest.cards) {
            const { body, ...entry } = card;
            const file = path.posix.join(card.path, 'cards', `card_${card.id}_${slugify(card.name)}.json`);
            await this.writeBody(dir, file, body);
            cards.push({ ...entry, file, checksum: checksumOf(body) });
        }

        const dashboards: JsonValue[] = [];
        for (const dashboard of manifest.dashboards) {
            const { body, ...entry } = dashboard;
            const file = path.posix.join(dashboard.path, 'dashboards', `dashboard_${dashboard.id}_${slugify(dashboard.name)}.json`);
            await this.writeBody(dir, file, body);
            dashboards.push({ ...entry, file, checksum: checksumOf(body) });
        }

        const index: JsonObject = {
            version: FORMAT_VERSION,
            meta: { ...manifest.meta },
            catalog: manifest.catalog.map(catalogEntryToJson),
            collections: manifest.collections.map(c => ({ ...c })),
            cards,
            dashboards,
            dependencies: manifest.dependencies.map(e => ({ ...e })),
            cycles: [...manifest.cycles],
        };
        const checksum = checksumOf(index);

        await fs.writeJson(path.join(dir, MANIFEST_FILE), { ...index, checksum }, { spaces: 2 });
        console.log(`📦 Manifest written to ${dir} (${manifest.cards.length} cards, ${manifest.dashboards.length} dashboards)`);
        return checksum;
    }

    async read(dir: string): Promise<Manifest> {
        const manifestPath = path.join(dir, MANIFEST_FILE);
        if (!(await fs.pathExists(manifestPath))) {
            throw new MigrationError(MigrationErrorCode.MANIFEST_INTEGRITY, `No ${MANIFEST_FILE} found in ${dir}`);
        }

        const raw = jsonObjectSchema.safeParse(await fs.readJson(manifestPath));
        if (!raw.success) {
            throw new ManifestIntegrityError(MANIFEST_FILE, 'a JSON object', 'something else');
        }
        const { checksum: recorded, ...content } = raw.data;
        const actual = checksumOf(content);
        if (recorded !== actual) {
            throw new ManifestIntegrityError(MANIFEST_FILE, String(recorded), actual);
        }

        const parsed = manifestFileSchema.safeParse(raw.data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new MigrationError(
                MigrationErrorCode.MANIFEST_INTEGRITY,
                `Invalid ${MANIFEST_FILE}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`
            );
        }
        const index = parsed.data;

        const cards: ManifestCard[] = [];
        for (const { file, checksum, ...entry } of index.cards) {
            cards.push({ ...entry, body: await this.readBody(dir, file, checksum) });
        }
        const dashboards: ManifestDashboard[] = [];
        for (const { file, checksum, ...entry } of index.dashboards) {
            dashboards.push({ ...entry, body: await this.readBody(dir, file, checksum) });
        }

        return {
            meta: index.meta,
            catalog: index.catalog,
            collections: index.collections,
            cards,
            dashboards,
            dependencies: index.dependencies,
            cycles: index.cycles,
        };
    }

    /** The recorded checksum of an export directory, or null when there is none. */
    async checksum(dir: string): Promise<string | null> {
        const manifestPath = path.join(dir, MANIFEST_FILE);
        if (!(await fs.pathExists(manifestPath))) return null;
        const raw = fileRefSchema.pick({ checksum: true }).safeParse(await fs.readJson(manifestPath));
        return raw.success ? raw.data.checksum : null;
    }

    private async writeBody(dir: string, file: string, body: JsonObject) {
        const target = path.join(dir, file);
        await fs.ensureDir(path.dirname(target));
        await fs.writeJson(target, body, { spaces: 2 });
    }

    private async readBody(dir: string, file: string, expected: string): Promise<JsonObject> {
        const target = path.resolve(dir, file);
        if (!target.startsWith(path.resolve(dir) + path.sep)) {
            throw new ManifestIntegrityError(file, 'a path inside the export', target);
        }
        if (!(await fs.pathExists(target))) {
            throw new ManifestIntegrityError(file, expected, 'missing file');
        }
        const parsed = jsonObjectSchema.safeParse(await fs.readJson(target));
        if (!parsed.success) {
            throw new ManifestIntegrityError(file, expected, 'not a JSON object');
        }
        const actual = checksumOf(parsed.data);
        if (actual !== expected) {
            throw new ManifestIntegrityError(file, expected, actual);
        }
        return parsed.data;
    }
}
