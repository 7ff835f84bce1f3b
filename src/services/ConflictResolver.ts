import type { MetabaseApi } from './MetabaseClient';
import type { CollectionItem, ConflictStrategy } from '../types';

export interface ExistingItem {
    id: number;
    name: string;
}

export type ConflictOutcome =
    | { action: 'create'; name: string }
    | { action: 'update'; targetId: number; name: string }
    | { action: 'skip'; targetId: number; name: string };

/**
 * Decides what happens to one item before it is rewritten.
 * `uniqueName` is only consulted for `rename` when the name is taken.
 */
export function resolveConflict(
    name: string,
    existing: ExistingItem | null,
    directive: ConflictStrategy,
    uniqueName: () => string
): ConflictOutcome {
    if (!existing) {
        return { action: 'create', name };
    }
    switch (directive) {
        case 'skip':
            return { action: 'skip', targetId: existing.id, name: existing.name };
        case 'overwrite':
            return { action: 'update', targetId: existing.id, name: existing.name };
        case 'rename':
            return { action: 'create', name: uniqueName() };
    }
}

export type ItemModel = 'card' | 'dataset' | 'metric' | 'dashboard' | 'collection';

/** Target collection contents, fetched once per collection and kept current as items are created. */
export class CollectionItemsIndex {
    private cache = new Map<string, CollectionItem[]>();

    constructor(private api: MetabaseApi) {}

    async decide(
        name: string,
        collectionId: number | null,
        model: ItemModel | ItemModel[],
        directive: ConflictStrategy
    ): Promise<ConflictOutcome> {
        const existing = await this.find(collectionId, model, name);
        const renamed = existing && directive === 'rename' ? await this.uniqueName(name, collectionId, model) : name;
        return resolveConflict(name, existing, directive, () => renamed);
    }

    async find(collectionId: number | null, model: ItemModel | ItemModel[], name: string): Promise<ExistingItem | null> {
        const models = Array.isArray(model) ? model : [model];
        const items = await this.items(collectionId);
        const match = items.find(i => i.name === name && models.some(m => m === i.model));
        return match ? { id: match.id, name: match.name } : null;
    }

    async uniqueName(base: string, collectionId: number | null, model: ItemModel | ItemModel[]): Promise<string> {
        return nextFreeName(base, await this.items(collectionId), model);
    }

    async remember(collectionId: number | null, item: CollectionItem): Promise<void> {
        const items = await this.items(collectionId);
        items.push(item);
    }

    private async items(collectionId: number | null): Promise<CollectionItem[]> {
        const key = this.key(collectionId);
        const cached = this.cache.get(key);
        if (cached) return cached;

        const items = collectionId !== null && collectionId < 0
            ? []
            : await this.api.getCollectionItems(collectionId ?? 'root');
        this.cache.set(key, items);
        return items;
    }

    private key(collectionId: number | null): string {
        return collectionId === null ? 'root' : String(collectionId);
    }
}

function nextFreeName(base: string, items: CollectionItem[], model: ItemModel | ItemModel[]): string {
    const models = Array.isArray(model) ? model : [model];
    const taken = new Set(items.filter(i => models.some(m => m === i.model)).map(i => i.name));
    let n = 1;
    while (taken.has(`${base} (${n})`)) n++;
    return `${base} (${n})`;
}
