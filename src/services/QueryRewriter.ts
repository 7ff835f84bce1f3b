import { MappingTable } from './MappingTable';
import type { IdentifierMapper } from './IdentifierMapper';
import { RemapError, type IdentifierKind } from '../errors';
import { isInteger, isJsonObject, jsonValueSchema, type JsonObject, type JsonValue } from '../lib/json';
import { childPath, parseExpression, parseQuery, serializeExpression, serializeQuery } from '../query/QueryParser';
import { rewriteCardReferences, rewriteCardTemplateTags } from '../query/templateTags';
import type {
    ExpressionNode,
    FieldRefNode,
    JoinNode,
    NativeStage,
    NodePath,
    QueryGeneration,
    SourceNode,
    StageNode,
    StructuredStage
} from '../query/types';

/**
 * `table`: numeric field ids belong to a catalog table and are remapped.
 * `card`: the stage reads a card's (or native stage's) columns; field ids are left as-is.
 */
type Scope = 'table' | 'card';

interface ExpressionContext {
    stageScope: Scope;
    joinScopes: Map<string, Scope>;
}

/** Per-stage metadata is recomputed by the platform and carries source-side ids. */
const METADATA_KEYS = new Set(['source-metadata', 'lib/stage-metadata']);

const METADATA_IDS: ReadonlyArray<readonly [string, 'field' | 'table']> = [
    ['id', 'field'],
    ['table_id', 'table'],
    ['fk_target_field_id', 'field'],
];

export interface QueryRewriteResult {
    query: JsonObject;
    generation: QueryGeneration;
    warnings: string[];
}

export interface CardRewriteResult {
    card: JsonObject;
    generation: QueryGeneration | null;
    warnings: string[];
}

export class QueryRewriter {
    constructor(
        private mapping: MappingTable,
        private mapper?: IdentifierMapper
    ) {}

    rewrite(datasetQuery: JsonObject, root: NodePath = '$'): QueryRewriteResult {
        const node = parseQuery(datasetQuery, root);
        const warnings: string[] = [];

        const databaseId = node.databaseId === null
            ? null
            : this.map('database', node.databaseId, childPath(root, 'database'));
        const { stages } = this.rewriteStages(node.stages, warnings);

        return {
            query: serializeQuery({ ...node, databaseId, stages }),
            generation: node.generation,
            warnings,
        };
    }

    /**
     * Rewrites a card body for the target. The query and card-level ids are strict;
     * `result_metadata` and `visualization_settings` are remapped loosely (see `looseId`).
     */
    rewriteCard(card: JsonObject): CardRewriteResult {
        const out: JsonObject = { ...card };

        let generation: QueryGeneration | null = null;
        const warnings: string[] = [];
        const datasetQuery = card.dataset_query;
        if (isJsonObject(datasetQuery)) {
            const result = this.rewrite(datasetQuery, '$.dataset_query');
            out.dataset_query = result.query;
            generation = result.generation;
            warnings.push(...result.warnings);
        }

        const databaseId = card.database_id;
        if (isInteger(databaseId)) {
            out.database_id = this.map('database', databaseId, '$.database_id');
        }
        const tableId = card.table_id;
        if (isInteger(tableId)) {
            out.table_id = this.map('table', tableId, '$.table_id');
        }

        const metadata = card.result_metadata;
        if (metadata !== undefined) {
            out.result_metadata = this.rewriteResultMetadata(metadata, warnings);
        }
        const settings = card.visualization_settings;
        if (settings !== undefined) {
            out.visualization_settings = this.rewriteVisualizationSettings(settings, warnings);
        }
        return { card: out, generation, warnings };
    }

    /** Column metadata: `field_ref`, `id`, `table_id` and `fk_target_field_id` of each column. */
    rewriteResultMetadata(metadata: JsonValue, warnings: string[], root: NodePath = '$.result_metadata'): JsonValue {
        if (!Array.isArray(metadata)) return metadata;
        return metadata.map((column, i) => {
            if (!isJsonObject(column)) return column;
            const path = childPath(root, i);
            const out: JsonObject = { ...column };

            const fieldRef = column.field_ref;
            if (fieldRef !== undefined) {
                out.field_ref = this.remapFieldRefs(fieldRef, childPath(path, 'field_ref'), warnings);
            }
            for (const [key, kind] of METADATA_IDS) {
                const value = column[key];
                if (isInteger(value)) out[key] = this.looseId(kind, value, childPath(path, key), warnings);
            }
            return out;
        });
    }

    /**
     * Field refs anywhere in the settings, including the JSON-encoded refs that key
     * `column_settings` (`'["ref",["field",101,null]]'`).
     */
    rewriteVisualizationSettings(settings: JsonValue, warnings: string[], root: NodePath = '$.visualization_settings'): JsonObject {
        if (!isJsonObject(settings)) return {};
        const out: JsonObject = {};
        for (const [key, value] of Object.entries(settings)) {
            const path = childPath(root, key);
            if (key !== 'column_settings' || !isJsonObject(value)) {
                out[key] = this.remapFieldRefs(value, path, warnings);
                continue;
            }
            const columns: JsonObject = {};
            for (const [columnKey, columnSettings] of Object.entries(value)) {
                const columnPath = childPath(path, columnKey);
                columns[this.remapColumnKey(columnKey, columnPath, warnings)] = this.remapFieldRefs(columnSettings, columnPath, warnings);
            }
            out[key] = columns;
        }
        return out;
    }

    /** Rewrites one field reference as if it sat in a table-scoped stage. */
    rewriteFieldRef(ref: JsonValue, path: NodePath): JsonValue {
        const node = parseExpression(ref, path);
        return serializeExpression(this.rewriteExpression(node, { stageScope: 'table', joinScopes: new Map() }));
    }

    private map(kind: IdentifierKind, sourceId: number, path: NodePath): number {
        const target = this.mapping.lookup(kind, sourceId);
        if (target === undefined) {
            throw new RemapError(path, kind, sourceId, this.mapper?.explain(kind, sourceId));
        }
        return target;
    }

    /** A miss keeps the source id and adds a warning instead of failing the card. */
    private looseId(kind: 'field' | 'table', sourceId: number, path: NodePath, warnings: string[]): number {
        const target = this.mapping.lookup(kind, sourceId);
        if (target !== undefined) return target;
        warnings.push(`${kind === 'field' ? 'Field' : 'Table'} ${sourceId} at ${path} is not mapped; left unchanged`);
        return sourceId;
    }

    private remapFieldRefs(value: JsonValue, path: NodePath, warnings: string[]): JsonValue {
        if (Array.isArray(value)) {
            const head = value[0];
            if ((head === 'field' || head === 'field-id') && value.length >= 2) {
                return this.remapLooseFieldRef(value, path, warnings);
            }
            return value.map((item, i) => this.remapFieldRefs(item, childPath(path, i), warnings));
        }
        if (isJsonObject(value)) {
            const out: JsonObject = {};
            for (const [key, item] of Object.entries(value)) {
                out[key] = this.remapFieldRefs(item, childPath(path, key), warnings);
            }
            return out;
        }
        return value;
    }

    private remapLooseFieldRef(ref: JsonValue[], path: NodePath, warnings: string[]): JsonValue[] {
        const out = [...ref];
        // ["field", opts, id] when staged, ["field", id, opts] otherwise
        const staged = isJsonObject(ref[1]);
        const idIndex = staged ? 2 : 1;
        const optionsIndex = staged ? 1 : 2;

        const id = ref[idIndex];
        if (isInteger(id)) out[idIndex] = this.looseId('field', id, childPath(path, idIndex), warnings);

        const options = ref[optionsIndex];
        const sourceField = isJsonObject(options) ? options['source-field'] : undefined;
        if (isJsonObject(options) && isInteger(sourceField)) {
            const optionsPath = childPath(childPath(path, optionsIndex), 'source-field');
            out[optionsIndex] = { ...options, 'source-field': this.looseId('field', sourceField, optionsPath, warnings) };
        }
        return out;
    }

    /** Re-encodes a `column_settings` key only when an id inside it changed. */
    private remapColumnKey(key: string, path: NodePath, warnings: string[]): string {
        const parsed = parseColumnKey(key);
        if (parsed === undefined) return key;
        const remapped = this.remapFieldRefs(parsed, path, warnings);
        const encoded = JSON.stringify(remapped);
        return encoded === JSON.stringify(parsed) ? key : encoded;
    }

    private rewriteStages(stages: StageNode[], warnings: string[]): { stages: StageNode[]; scope: Scope } {
        const out: StageNode[] = [];
        let scope: Scope = 'card';

        for (const stage of stages) {
            if (stage.kind === 'native') {
                out.push(this.rewriteNative(stage, warnings));
                scope = 'card';
                continue;
            }
            if (stage.source.kind === 'table') scope = 'table';
            else if (stage.source.kind === 'card') scope = 'card';
            out.push(this.rewriteStructured(stage, scope, warnings));
        }
        return { stages: out, scope };
    }

    private rewriteSource(source: SourceNode): SourceNode {
        switch (source.kind) {
            case 'table':
                return { ...source, tableId: this.map('table', source.tableId, source.path) };
            case 'card':
                return { ...source, cardId: this.map('card', source.cardId, source.path) };
            case 'previous-stage':
                return source;
        }
    }

    private rewriteStructured(stage: StructuredStage, scope: Scope, warnings: string[]): StructuredStage {
        const source = this.rewriteSource(stage.source);

        const joinScopes = new Map<string, Scope>();
        const joinStages = stage.joins.map(join => {
            const rewritten = this.rewriteStages(join.stages, warnings);
            if (join.alias !== null) joinScopes.set(join.alias, rewritten.scope);
            return rewritten.stages;
        });

        const ctx: ExpressionContext = { stageScope: scope, joinScopes };
        const joins = stage.joins.map((join, i): JoinNode => ({
            ...join,
            stages: joinStages[i],
            conditions: join.conditions.map(c => this.rewriteExpression(c, ctx)),
            clauses: join.clauses.map(c => ({ key: c.key, value: this.rewriteExpression(c.value, ctx) })),
        }));

        return {
            ...stage,
            source,
            joins,
            filters: stage.filters.map(f => this.rewriteExpression(f, ctx)),
            clauses: stage.clauses
                .filter(c => !METADATA_KEYS.has(c.key))
                .map(c => ({ key: c.key, value: this.rewriteExpression(c.value, ctx) })),
        };
    }

    private rewriteExpression(node: ExpressionNode, ctx: ExpressionContext, scope?: Scope): ExpressionNode {
        switch (node.kind) {
            case 'field':
                return this.rewriteField(node, ctx, scope);
            case 'list': {
                const [head, alias, inner] = node.items;
                // ["joined-field", alias, field]
                if (
                    node.items.length === 3 &&
                    head.kind === 'literal' && head.value === 'joined-field' &&
                    alias.kind === 'literal' && typeof alias.value === 'string'
                ) {
                    const joinScope = ctx.joinScopes.get(alias.value) ?? ctx.stageScope;
                    return { ...node, items: [head, alias, this.rewriteExpression(inner, ctx, joinScope)] };
                }
                return { ...node, items: node.items.map(item => this.rewriteExpression(item, ctx, scope)) };
            }
            case 'map':
                return {
                    ...node,
                    entries: node.entries.map(([k, v]): [string, ExpressionNode] => [k, this.rewriteExpression(v, ctx, scope)]),
                };
            case 'literal':
                return node;
        }
    }

    private rewriteField(node: FieldRefNode, ctx: ExpressionContext, forced?: Scope): FieldRefNode {
        const options = node.options;
        const alias = options?.['join-alias'];
        const scope = forced ?? (typeof alias === 'string' ? ctx.joinScopes.get(alias) ?? ctx.stageScope : ctx.stageScope);

        const idIndex = node.form === 'staged-field' ? 2 : 1;
        const optionsIndex = node.form === 'staged-field' ? 1 : 2;

        // source-field marks an implicit join: the id itself points into the joined table
        const sourceField = options?.['source-field'];
        const implicitJoin = isInteger(sourceField);

        let rewrittenOptions = options;
        if (options && isInteger(sourceField) && scope === 'table') {
            rewrittenOptions = {
                ...options,
                'source-field': this.map('field', sourceField, childPath(childPath(node.path, optionsIndex), 'source-field')),
            };
        }

        let fieldId = node.fieldId;
        if (typeof fieldId === 'number' && (scope === 'table' || implicitJoin)) {
            fieldId = this.map('field', fieldId, childPath(node.path, idIndex));
        }

        return { ...node, fieldId, options: rewrittenOptions };
    }

    private rewriteNative(stage: NativeStage, warnings: string[]): NativeStage {
        const lookup = (id: number) => this.mapping.lookup('card', id);
        const unresolved = new Set<number>();

        const sql = rewriteCardReferences(stage.sql, lookup);
        sql.unresolved.forEach(id => unresolved.add(id));

        let templateTags = stage.templateTags;
        if (templateTags) {
            const tagsPath = childPath(stage.path, 'template-tags');
            const renamed = rewriteCardTemplateTags(templateTags, lookup);
            renamed.unresolved.forEach(id => unresolved.add(id));

            templateTags = {};
            for (const [key, tag] of Object.entries(renamed.value)) {
                if (isJsonObject(tag) && tag.type === 'dimension' && Array.isArray(tag.dimension)) {
                    const path = childPath(childPath(tagsPath, key), 'dimension');
                    templateTags[key] = { ...tag, dimension: this.rewriteFieldRef(tag.dimension, path) };
                } else {
                    templateTags[key] = tag;
                }
            }
        }

        for (const id of unresolved) {
            warnings.push(`Card ${id} referenced by native query at ${stage.path} is not mapped; tag left unchanged`);
        }
        return { ...stage, sql: sql.value, templateTags };
    }
}

function parseColumnKey(key: string): JsonValue | undefined {
    if (!key.startsWith('[')) return undefined;
    let raw: unknown;
    try {
        raw = JSON.parse(key);
    } catch {
        return undefined;
    }
    const parsed = jsonValueSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}
