import type { JsonObject, JsonValue } from '../lib/json';

/**
 * `legacy`: one flat structured query under `query`, `"card__N"` card sources,
 * `["field", id, opts]` refs, singular `filter`.
 * `staged`: a `stages` sequence, integer `source-card`, `["field", opts, id]` refs,
 * plural `filters`.
 */
export type QueryGeneration = 'legacy' | 'staged';

/** JSON path of a node in the document it was parsed from, e.g. `$.query.joins[0]["source-table"]`. */
export type NodePath = string;

export type CardEncoding = 'prefixed-string' | 'integer';

export interface TableSource {
    kind: 'table';
    tableId: number;
    path: NodePath;
}

export interface CardSource {
    kind: 'card';
    cardId: number;
    encoding: CardEncoding;
    /** The key the reference was read from; staged stages use `source-card` for integers. */
    key: 'source-table' | 'source-card';
    path: NodePath;
}

export interface PreviousStageSource {
    kind: 'previous-stage';
    path: NodePath;
}

export type SourceNode = TableSource | CardSource | PreviousStageSource;

export type FieldRefForm = 'field' | 'field-id' | 'staged-field';

export interface FieldRefNode {
    kind: 'field';
    form: FieldRefForm;
    /** Numeric ids point at a catalog field; strings name a column of the stage's input. */
    fieldId: number | string;
    options: JsonObject | null;
    path: NodePath;
}

export interface ListNode {
    kind: 'list';
    items: ExpressionNode[];
    path: NodePath;
}

export interface MapNode {
    kind: 'map';
    entries: Array<[string, ExpressionNode]>;
    path: NodePath;
}

export interface LiteralNode {
    kind: 'literal';
    value: JsonValue;
    path: NodePath;
}

export type ExpressionNode = FieldRefNode | ListNode | MapNode | LiteralNode;

export interface ClauseEntry {
    key: string;
    value: ExpressionNode;
}

export interface JoinNode {
    kind: 'join';
    alias: string | null;
    /**
     * `nested`: the join carries its own `stages`.
     * `inline`: `source-table` or `source-query` sit on the join object itself.
     */
    form: 'nested' | 'inline-table' | 'inline-query';
    stages: StageNode[];
    conditionKey: 'condition' | 'conditions';
    conditions: ExpressionNode[];
    clauses: ClauseEntry[];
    path: NodePath;
}

export interface StructuredStage {
    kind: 'structured';
    source: SourceNode;
    joins: JoinNode[];
    filterKey: 'filter' | 'filters' | null;
    filters: ExpressionNode[];
    clauses: ClauseEntry[];
    path: NodePath;
}

export interface NativeStage {
    kind: 'native';
    /** `query` under a legacy top-level `native` object, `native` everywhere else. */
    sqlKey: 'query' | 'native';
    sql: string;
    templateTags: JsonObject | null;
    /** Remaining keys of the native object, e.g. `collection` or `lib/type`. */
    extra: JsonObject;
    path: NodePath;
}

export type StageNode = StructuredStage | NativeStage;

export interface QueryNode {
    generation: QueryGeneration;
    /**
     * `stages`: the document carries a `stages` array.
     * `inner-query`: a staged query written as a single stage under `query`.
     * `flat`: a legacy document.
     */
    shape: 'stages' | 'inner-query' | 'flat';
    databaseId: number | null;
    stages: StageNode[];
    /** Top-level keys the rewriter does not interpret, e.g. `parameters` or `info`. */
    attributes: JsonObject;
}
