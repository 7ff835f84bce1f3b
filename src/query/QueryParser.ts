import { MalformedQueryError } from '../errors';
import { isInteger, isJsonObject, type JsonObject, type JsonValue } from '../lib/json';
import type {
    ClauseEntry,
    ExpressionNode,
    JoinNode,
    NativeStage,
    NodePath,
    QueryGeneration,
    QueryNode,
    SourceNode,
    StageNode,
    StructuredStage
} from './types';

const CARD_SOURCE = /^card__(\d+)$/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const SOURCE_KEYS = ['source-table', 'source-card', 'source-query'];
const STAGE_KEYS = new Set([...SOURCE_KEYS, 'joins', 'filter', 'filters']);
const JOIN_KEYS = new Set([...SOURCE_KEYS, 'stages', 'condition', 'conditions', 'alias']);

export function childPath(path: NodePath, key: string | number): NodePath {
    if (typeof key === 'number') return `${path}[${key}]`;
    return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

/**
 * Decided from the document's own shape, never from configuration: one export can hold
 * cards saved on either side of a platform upgrade.
 */
export function detectGeneration(datasetQuery: JsonObject): QueryGeneration {
    if (Array.isArray(datasetQuery.stages) || datasetQuery['lib/type'] === 'mbql/query') {
        return 'staged';
    }
    const inner = datasetQuery.query;
    if (isJsonObject(inner) && (Array.isArray(inner.filters) || isInteger(inner['source-card']))) {
        return 'staged';
    }
    return 'legacy';
}

/** `root` is the path of the query within its enclosing document, e.g. `$.dataset_query`. */
export function parseQuery(datasetQuery: JsonObject, root: NodePath = '$'): QueryNode {
    const generation = detectGeneration(datasetQuery);
    const databaseId = parseDatabaseId(datasetQuery.database, childPath(root, 'database'));

    if (generation === 'staged') {
        const stages = datasetQuery.stages;
        if (Array.isArray(stages)) {
            return {
                generation,
                shape: 'stages',
                databaseId,
                stages: parseStagedStages(stages, childPath(root, 'stages')),
                attributes: omit(datasetQuery, ['database', 'stages']),
            };
        }
        const inner = datasetQuery.query;
        if (!isJsonObject(inner)) {
            throw new MalformedQueryError(root, 'staged query has neither stages nor query');
        }
        return {
            generation,
            shape: 'inner-query',
            databaseId,
            stages: [parseStagedStage(inner, childPath(root, 'query'), 0)],
            attributes: omit(datasetQuery, ['database', 'query']),
        };
    }

    const attributes = omit(datasetQuery, ['database', 'type', 'query', 'native']);
    const native = datasetQuery.native;
    if (datasetQuery.type === 'native' || (datasetQuery.query === undefined && native !== undefined)) {
        if (!isJsonObject(native)) {
            throw new MalformedQueryError(childPath(root, 'native'), 'native query must be an object');
        }
        return {
            generation,
            shape: 'flat',
            databaseId,
            stages: [parseNative(native, childPath(root, 'native'), 'query')],
            attributes,
        };
    }

    const query = datasetQuery.query;
    if (!isJsonObject(query)) {
        throw new MalformedQueryError(root, 'expected a query or native object');
    }
    return { generation, shape: 'flat', databaseId, stages: parseLegacyChain(query, childPath(root, 'query')), attributes };
}

export function serializeQuery(node: QueryNode): JsonObject {
    const out: JsonObject = { ...node.attributes };
    if (node.databaseId !== null) out.database = node.databaseId;

    if (node.generation === 'staged') {
        const stages = node.stages.map(serializeStagedStage);
        if (node.shape === 'inner-query') {
            out.query = stages[0] ?? {};
        } else {
            out.stages = stages;
        }
        return out;
    }

    const first = node.stages[0];
    if (node.stages.length === 1 && first?.kind === 'native' && first.sqlKey === 'query') {
        out.type = 'native';
        out.native = serializeNative(first);
        return out;
    }
    out.type = 'query';
    out.query = foldLegacyChain(node.stages);
    return out;
}

export function parseExpression(value: JsonValue, path: NodePath): ExpressionNode {
    if (Array.isArray(value)) {
        const [head, second, third] = value;
        if (head === 'field-id' && value.length === 2 && isInteger(second)) {
            return { kind: 'field', form: 'field-id', fieldId: second, options: null, path };
        }
        if (head === 'field' && value.length >= 2 && value.length <= 3) {
            if (isJsonObject(second) && (isInteger(third) || typeof third === 'string')) {
                return { kind: 'field', form: 'staged-field', fieldId: third, options: second, path };
            }
            if ((isInteger(second) || typeof second === 'string') && (third === undefined || third === null || isJsonObject(third))) {
                return { kind: 'field', form: 'field', fieldId: second, options: isJsonObject(third) ? third : null, path };
            }
        }
        return { kind: 'list', items: value.map((item, i) => parseExpression(item, childPath(path, i))), path };
    }
    if (isJsonObject(value)) {
        return {
            kind: 'map',
            entries: Object.entries(value).map(([k, v]): [string, ExpressionNode] => [k, parseExpression(v, childPath(path, k))]),
            path,
        };
    }
    return { kind: 'literal', value, path };
}

export function serializeExpression(node: ExpressionNode): JsonValue {
    switch (node.kind) {
        case 'field':
            if (node.form === 'field-id') return ['field-id', node.fieldId];
            if (node.form === 'staged-field') return ['field', node.options ?? {}, node.fieldId];
            return ['field', node.fieldId, node.options];
        case 'list':
            return node.items.map(serializeExpression);
        case 'map':
            return Object.fromEntries(node.entries.map(([k, v]) => [k, serializeExpression(v)]));
        case 'literal':
            return node.value;
    }
}

// ======================
// STAGES
// ======================

function parseDatabaseId(value: JsonValue | undefined, path: NodePath): number | null {
    if (value === undefined || value === null) return null;
    if (!isInteger(value)) {
        throw new MalformedQueryError(path, `expected an integer, got ${JSON.stringify(value)}`);
    }
    return value;
}

/** A legacy `source-query` chain, innermost first. */
function parseLegacyChain(query: JsonObject, path: NodePath): StageNode[] {
    if (typeof query.native === 'string') {
        return [parseNative(query, path, 'native')];
    }

    const inner = query['source-query'];
    if (inner !== undefined) {
        const innerPath = childPath(path, 'source-query');
        if (!isJsonObject(inner)) {
            throw new MalformedQueryError(innerPath, 'source-query must be an object');
        }
        const previous = parseLegacyChain(inner, innerPath);
        return [...previous, parseStructured(query, path, { kind: 'previous-stage', path: innerPath })];
    }

    const source = parseSource(query, path);
    if (!source) {
        throw new MalformedQueryError(path, 'structured query has no source-table or source-query');
    }
    return [parseStructured(query, path, source)];
}

function parseStagedStages(stages: JsonValue[], path: NodePath): StageNode[] {
    return stages.map((stage, i) => {
        const stagePath = childPath(path, i);
        if (!isJsonObject(stage)) {
            throw new MalformedQueryError(stagePath, 'stage must be an object');
        }
        return parseStagedStage(stage, stagePath, i);
    });
}

function parseStagedStage(stage: JsonObject, path: NodePath, index: number): StageNode {
    if (stage['lib/type'] === 'mbql.stage/native' || typeof stage.native === 'string') {
        return parseNative(stage, path, 'native');
    }

    const source = parseSource(stage, path);
    if (source) return parseStructured(stage, path, source);
    if (index === 0) {
        throw new MalformedQueryError(path, 'first stage has no source-table or source-card');
    }
    return parseStructured(stage, path, { kind: 'previous-stage', path });
}

function parseSource(query: JsonObject, path: NodePath): SourceNode | null {
    const card = query['source-card'];
    if (card !== undefined) {
        const cardPath = childPath(path, 'source-card');
        if (!isInteger(card)) {
            throw new MalformedQueryError(cardPath, `expected an integer card id, got ${JSON.stringify(card)}`);
        }
        return { kind: 'card', cardId: card, encoding: 'integer', key: 'source-card', path: cardPath };
    }

    const table = query['source-table'];
    if (table === undefined) return null;
    const tablePath = childPath(path, 'source-table');
    if (isInteger(table)) {
        return { kind: 'table', tableId: table, path: tablePath };
    }
    const match = typeof table === 'string' ? CARD_SOURCE.exec(table) : null;
    if (!match) {
        throw new MalformedQueryError(tablePath, `unrecognised source-table ${JSON.stringify(table)}`);
    }
    return { kind: 'card', cardId: Number(match[1]), encoding: 'prefixed-string', key: 'source-table', path: tablePath };
}

function parseStructured(query: JsonObject, path: NodePath, source: SourceNode): StructuredStage {
    const stage: StructuredStage = {
        kind: 'structured',
        source,
        joins: [],
        filterKey: null,
        filters: [],
        clauses: parseClauses(query, path, STAGE_KEYS),
        path,
    };

    const joins = query.joins;
    if (joins !== undefined) {
        const joinsPath = childPath(path, 'joins');
        if (!Array.isArray(joins)) {
            throw new MalformedQueryError(joinsPath, 'joins must be an array');
        }
        stage.joins = joins.map((join, i) => parseJoin(join, childPath(joinsPath, i)));
    }

    if (query.filters !== undefined) {
        const filters = query.filters;
        const filtersPath = childPath(path, 'filters');
        if (!Array.isArray(filters)) {
            throw new MalformedQueryError(filtersPath, 'filters must be an array');
        }
        stage.filterKey = 'filters';
        stage.filters = filters.map((f, i) => parseExpression(f, childPath(filtersPath, i)));
    } else if (query.filter !== undefined) {
        stage.filterKey = 'filter';
        stage.filters = [parseExpression(query.filter, childPath(path, 'filter'))];
    }
    return stage;
}

function parseJoin(join: JsonValue, path: NodePath): JoinNode {
    if (!isJsonObject(join)) {
        throw new MalformedQueryError(path, 'join must be an object');
    }

    let form: JoinNode['form'];
    let stages: StageNode[];
    if (Array.isArray(join.stages)) {
        form = 'nested';
        stages = parseStagedStages(join.stages, childPath(path, 'stages'));
    } else if (join['source-query'] !== undefined) {
        const inner = join['source-query'];
        const innerPath = childPath(path, 'source-query');
        if (!isJsonObject(inner)) {
            throw new MalformedQueryError(innerPath, 'source-query must be an object');
        }
        form = 'inline-query';
        stages = parseLegacyChain(inner, innerPath);
    } else {
        const source = parseSource(join, path);
        if (!source) {
            throw new MalformedQueryError(path, 'join has no source');
        }
        form = 'inline-table';
        stages = [{ kind: 'structured', source, joins: [], filterKey: null, filters: [], clauses: [], path }];
    }

    let conditionKey: JoinNode['conditionKey'] = 'condition';
    let conditions: ExpressionNode[] = [];
    if (Array.isArray(join.conditions)) {
        conditionKey = 'conditions';
        const conditionsPath = childPath(path, 'conditions');
        conditions = join.conditions.map((c, i) => parseExpression(c, childPath(conditionsPath, i)));
    } else if (join.condition !== undefined) {
        conditions = [parseExpression(join.condition, childPath(path, 'condition'))];
    }

    return {
        kind: 'join',
        alias: typeof join.alias === 'string' ? join.alias : null,
        form,
        stages,
        conditionKey,
        conditions,
        clauses: parseClauses(join, path, JOIN_KEYS),
        path,
    };
}

function parseClauses(obj: JsonObject, path: NodePath, handled: Set<string>): ClauseEntry[] {
    return Object.entries(obj)
        .filter(([key]) => !handled.has(key))
        .map(([key, value]) => ({ key, value: parseExpression(value, childPath(path, key)) }));
}

function parseNative(obj: JsonObject, path: NodePath, sqlKey: NativeStage['sqlKey']): NativeStage {
    const sql = obj[sqlKey];
    if (typeof sql !== 'string') {
        throw new MalformedQueryError(childPath(path, sqlKey), 'native SQL must be a string');
    }
    const tags = obj['template-tags'];
    if (tags !== undefined && tags !== null && !isJsonObject(tags)) {
        throw new MalformedQueryError(childPath(path, 'template-tags'), 'template-tags must be an object');
    }
    return {
        kind: 'native',
        sqlKey,
        sql,
        templateTags: isJsonObject(tags) ? tags : null,
        extra: omit(obj, [sqlKey, 'template-tags']),
        path,
    };
}

function serializeNative(stage: NativeStage): JsonObject {
    const out: JsonObject = { ...stage.extra, [stage.sqlKey]: stage.sql };
    if (stage.templateTags) out['template-tags'] = stage.templateTags;
    return out;
}

function serializeStagedStage(stage: StageNode): JsonObject {
    return stage.kind === 'native' ? serializeNative(stage) : serializeStructured(stage, null);
}

function foldLegacyChain(stages: StageNode[]): JsonObject {
    let folded: JsonObject | null = null;
    for (const stage of stages) {
        folded = stage.kind === 'native' ? serializeNative(stage) : serializeStructured(stage, folded);
    }
    if (!folded) {
        throw new MalformedQueryError('$', 'query has no stages');
    }
    return folded;
}

function serializeSource(source: SourceNode, out: JsonObject) {
    if (source.kind === 'table') {
        out['source-table'] = source.tableId;
    } else if (source.kind === 'card') {
        out[source.key] = source.encoding === 'prefixed-string' ? `card__${source.cardId}` : source.cardId;
    }
}

function serializeStructured(stage: StructuredStage, previous: JsonObject | null): JsonObject {
    const out: JsonObject = {};
    for (const clause of stage.clauses) {
        out[clause.key] = serializeExpression(clause.value);
    }

    if (stage.source.kind === 'previous-stage') {
        if (previous) out['source-query'] = previous;
    } else {
        serializeSource(stage.source, out);
    }

    if (stage.joins.length > 0) {
        out.joins = stage.joins.map(serializeJoin);
    }
    if (stage.filterKey === 'filters') {
        out.filters = stage.filters.map(serializeExpression);
    } else if (stage.filterKey === 'filter' && stage.filters.length > 0) {
        out.filter = serializeExpression(stage.filters[0]);
    }
    return out;
}

function serializeJoin(join: JoinNode): JsonObject {
    const out: JsonObject = {};
    for (const clause of join.clauses) {
        out[clause.key] = serializeExpression(clause.value);
    }

    if (join.form === 'nested') {
        out.stages = join.stages.map(serializeStagedStage);
    } else if (join.form === 'inline-query') {
        out['source-query'] = foldLegacyChain(join.stages);
    } else {
        const first = join.stages[0];
        if (first?.kind === 'structured') serializeSource(first.source, out);
    }

    if (join.conditionKey === 'conditions') {
        out.conditions = join.conditions.map(serializeExpression);
    } else if (join.conditions.length > 0) {
        out.condition = serializeExpression(join.conditions[0]);
    }
    if (join.alias !== null) out.alias = join.alias;
    return out;
}

function omit(obj: JsonObject, keys: string[]): JsonObject {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(obj)) {
        if (!keys.includes(k)) out[k] = v;
    }
    return out;
}
