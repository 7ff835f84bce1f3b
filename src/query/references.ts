import { isInteger, isJsonObject, type JsonObject } from '../lib/json';
import { parseExpression } from './QueryParser';
import { findCardReferences, findTemplateTagCards } from './templateTags';
import type { ExpressionNode, QueryNode, StageNode } from './types';

export interface QueryReferences {
    databases: number[];
    tables: number[];
    fields: number[];
    cards: number[];
}

/** Every numeric identifier a query embeds, per kind, sorted and unique. */
export function collectReferences(node: QueryNode): QueryReferences {
    const refs = {
        databases: new Set<number>(),
        tables: new Set<number>(),
        fields: new Set<number>(),
        cards: new Set<number>(),
    };
    if (node.databaseId !== null) refs.databases.add(node.databaseId);
    for (const stage of node.stages) visitStage(stage, refs);

    return {
        databases: sorted(refs.databases),
        tables: sorted(refs.tables),
        fields: sorted(refs.fields),
        cards: sorted(refs.cards),
    };
}

type ReferenceSets = Record<keyof QueryReferences, Set<number>>;

function visitStage(stage: StageNode, refs: ReferenceSets) {
    if (stage.kind === 'native') {
        for (const id of findCardReferences(stage.sql)) refs.cards.add(id);
        if (stage.templateTags) visitTemplateTags(stage.templateTags, refs);
        return;
    }

    if (stage.source.kind === 'table') refs.tables.add(stage.source.tableId);
    if (stage.source.kind === 'card') refs.cards.add(stage.source.cardId);

    for (const join of stage.joins) {
        for (const inner of join.stages) visitStage(inner, refs);
        for (const condition of join.conditions) visitExpression(condition, refs);
        for (const clause of join.clauses) visitExpression(clause.value, refs);
    }
    for (const filter of stage.filters) visitExpression(filter, refs);
    for (const clause of stage.clauses) visitExpression(clause.value, refs);
}

function visitTemplateTags(tags: JsonObject, refs: ReferenceSets) {
    for (const id of findTemplateTagCards(tags)) refs.cards.add(id);
    for (const tag of Object.values(tags)) {
        if (isJsonObject(tag) && tag.type === 'dimension' && tag.dimension !== undefined) {
            visitExpression(parseExpression(tag.dimension, '$'), refs);
        }
    }
}

function visitExpression(node: ExpressionNode, refs: ReferenceSets) {
    switch (node.kind) {
        case 'field': {
            if (typeof node.fieldId === 'number') refs.fields.add(node.fieldId);
            const sourceField = node.options?.['source-field'];
            if (isInteger(sourceField)) refs.fields.add(sourceField);
            return;
        }
        case 'list':
            for (const item of node.items) visitExpression(item, refs);
            return;
        case 'map':
            for (const [, value] of node.entries) visitExpression(value, refs);
            return;
        case 'literal':
            return;
    }
}

function sorted(ids: Set<number>): number[] {
    return Array.from(ids).sort((a, b) => a - b);
}
