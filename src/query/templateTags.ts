import { isInteger, isJsonObject, type JsonObject } from '../lib/json';

/** `{{#123}}`, `{{#123-orders-model}}`, `{{ #123-x }}` */
const SQL_CARD_TAG = /(\{\{\s*#)(\d+)((?:-[^}]*)?\s*\}\})/g;
const LEADING_ID = /^(#?)(\d+)/;

export type CardLookup = (sourceCardId: number) => number | undefined;

export interface CardReferenceRewrite<T> {
    value: T;
    /** Source card ids with no mapping; their tags were left untouched. */
    unresolved: number[];
}

export function findCardReferences(sql: string): number[] {
    const ids: number[] = [];
    for (const match of sql.matchAll(SQL_CARD_TAG)) {
        const id = Number(match[2]);
        if (!ids.includes(id)) ids.push(id);
    }
    return ids;
}

export function rewriteCardReferences(sql: string, lookup: CardLookup): CardReferenceRewrite<string> {
    const unresolved: number[] = [];
    const value = sql.replace(SQL_CARD_TAG, (whole: string, open: string, id: string, rest: string) => {
        const sourceId = Number(id);
        const targetId = lookup(sourceId);
        if (targetId === undefined) {
            if (!unresolved.includes(sourceId)) unresolved.push(sourceId);
            return whole;
        }
        return `${open}${targetId}${rest}`;
    });
    return { value, unresolved };
}

/** Card id a `type: "card"` template tag points at, from `card-id` or else its key. */
export function cardTagId(key: string, tag: JsonObject): number | null {
    if (tag.type !== 'card') return null;
    const cardId = tag['card-id'];
    if (isInteger(cardId)) return cardId;
    const match = LEADING_ID.exec(key);
    return match ? Number(match[2]) : null;
}

export function findTemplateTagCards(tags: JsonObject): number[] {
    const ids: number[] = [];
    for (const [key, tag] of Object.entries(tags)) {
        if (!isJsonObject(tag)) continue;
        const id = cardTagId(key, tag);
        if (id !== null && !ids.includes(id)) ids.push(id);
    }
    return ids;
}

/**
 * Renames card template tags to their target card: the key, `card-id`, `name`
 * and `display-name` all carry the id, with or without a leading `#`.
 */
export function rewriteCardTemplateTags(tags: JsonObject, lookup: CardLookup): CardReferenceRewrite<JsonObject> {
    const unresolved: number[] = [];
    const value: JsonObject = {};

    for (const [key, tag] of Object.entries(tags)) {
        if (!isJsonObject(tag)) {
            value[key] = tag;
            continue;
        }
        const sourceId = cardTagId(key, tag);
        if (sourceId === null) {
            value[key] = tag;
            continue;
        }
        const targetId = lookup(sourceId);
        if (targetId === undefined) {
            if (!unresolved.includes(sourceId)) unresolved.push(sourceId);
            value[key] = tag;
            continue;
        }

        const renamed: JsonObject = { ...tag, 'card-id': targetId };
        const name = tag.name;
        const displayName = tag['display-name'];
        if (typeof name === 'string') renamed.name = renameLeadingId(name, sourceId, targetId);
        if (typeof displayName === 'string') {
            renamed['display-name'] = renameLeadingId(displayName, sourceId, targetId);
        }
        value[renameLeadingId(key, sourceId, targetId)] = renamed;
    }
    return { value, unresolved };
}

function renameLeadingId(text: string, sourceId: number, targetId: number): string {
    const match = LEADING_ID.exec(text);
    if (!match || Number(match[2]) !== sourceId) return text;
    return `${match[1]}${targetId}${text.slice(match[0].length)}`;
}
