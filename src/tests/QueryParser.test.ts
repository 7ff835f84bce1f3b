import { describe, expect, it } from 'vitest';
import { MalformedQueryError } from '../errors';
import type { JsonObject } from '../lib/json';
import { childPath, detectGeneration, parseExpression, parseQuery, serializeQuery } from '../query/QueryParser';
import { collectReferences } from '../query/references';

describe('detectGeneration', () => {
    it('tells the two formats apart by shape', () => {
        expect(detectGeneration({ database: 1, type: 'query', query: { 'source-table': 10 } })).toBe('legacy');
        expect(detectGeneration({ database: 1, type: 'native', native: { query: 'select 1' } })).toBe('legacy');
        expect(detectGeneration({ 'lib/type': 'mbql/query', database: 1, stages: [] })).toBe('staged');
        expect(detectGeneration({ database: 1, query: { 'source-card': 7 } })).toBe('staged');
        expect(detectGeneration({ database: 1, query: { 'source-table': 10, filters: [] } })).toBe('staged');
    });
});

describe('childPath', () => {
    it('quotes keys that are not identifiers', () => {
        expect(childPath('$', 'query')).toBe('$.query');
        expect(childPath('$.query', 'source-table')).toBe('$.query["source-table"]');
        expect(childPath('$.joins', 2)).toBe('$.joins[2]');
    });
});

describe('parseQuery', () => {
    it('turns a source-query chain into stages, innermost first', () => {
        const query: JsonObject = {
            database: 1,
            type: 'query',
            query: { 'source-query': { 'source-table': 10 }, limit: 5 },
        };
        const node = parseQuery(query);

        expect(node.stages).toHaveLength(2);
        const [inner, outer] = node.stages;
        expect(inner?.kind === 'structured' && inner.source).toEqual({
            kind: 'table',
            tableId: 10,
            path: '$.query["source-query"]["source-table"]',
        });
        expect(outer?.kind === 'structured' && outer.source.kind).toBe('previous-stage');
        expect(serializeQuery(node)).toEqual(query);
    });

    it('reads staged card sources as integers and keeps the shape', () => {
        const query: JsonObject = {
            'lib/type': 'mbql/query',
            database: 1,
            stages: [{ 'lib/type': 'mbql.stage/mbql', 'source-card': 7, limit: 10 }],
        };
        const node = parseQuery(query);
        const stage = node.stages[0];

        expect(node.generation).toBe('staged');
        expect(stage?.kind === 'structured' && stage.source).toEqual({
            kind: 'card',
            cardId: 7,
            encoding: 'integer',
            key: 'source-card',
            path: '$.stages[0]["source-card"]',
        });
        expect(serializeQuery(node)).toEqual(query);
    });

    it('keeps legacy card sources as prefixed strings', () => {
        const query: JsonObject = { database: 1, type: 'query', query: { 'source-table': 'card__7' } };
        const stage = parseQuery(query).stages[0];

        expect(stage?.kind === 'structured' && stage.source.kind === 'card' && stage.source.encoding).toBe('prefixed-string');
        expect(serializeQuery(parseQuery(query))).toEqual(query);
    });

    it('round-trips a native query', () => {
        const query: JsonObject = {
            database: 1,
            type: 'native',
            native: { query: 'select * from {{#7}}', 'template-tags': {} },
        };
        expect(serializeQuery(parseQuery(query))).toEqual(query);
    });

    it('rejects a first stage without a source', () => {
        const query: JsonObject = { 'lib/type': 'mbql/query', database: 1, stages: [{ limit: 1 }] };
        expect(() => parseQuery(query)).toThrow(MalformedQueryError);
        expect(() => parseQuery(query)).toThrow('Malformed query at $.stages[0]: first stage has no source-table or source-card');
    });

    it('rejects an unrecognised source-table', () => {
        const query: JsonObject = { database: 1, type: 'query', query: { 'source-table': 'orders' } };
        expect(() => parseQuery(query)).toThrow('Malformed query at $.query["source-table"]: unrecognised source-table "orders"');
    });

    it('finds the same identifiers in equivalent legacy and staged queries', () => {
        const legacy: JsonObject = {
            database: 1,
            type: 'query',
            query: {
                'source-table': 10,
                filter: ['=', ['field', 101, null], 'x'],
                breakout: [['field', 100, { 'temporal-unit': 'month' }]],
            },
        };
        const staged: JsonObject = {
            'lib/type': 'mbql/query',
            database: 1,
            stages: [
                {
                    'lib/type': 'mbql.stage/mbql',
                    'source-table': 10,
                    filters: [['=', {}, ['field', {}, 101], 'x']],
                    breakout: [['field', { 'temporal-unit': 'month' }, 100]],
                },
            ],
        };

        const expected = { databases: [1], tables: [10], fields: [100, 101], cards: [] };
        expect(collectReferences(parseQuery(legacy))).toEqual(expected);
        expect(collectReferences(parseQuery(staged))).toEqual(expected);
    });
});

describe('parseExpression', () => {
    it('recognises the three field reference forms', () => {
        expect(parseExpression(['field-id', 5], '$')).toMatchObject({ kind: 'field', form: 'field-id', fieldId: 5 });
        expect(parseExpression(['field', 5, null], '$')).toMatchObject({ kind: 'field', form: 'field', fieldId: 5, options: null });
        expect(parseExpression(['field', { 'base-type': 'type/Text' }, 'name'], '$')).toMatchObject({
            kind: 'field',
            form: 'staged-field',
            fieldId: 'name',
        });
        expect(parseExpression(['count'], '$')).toMatchObject({ kind: 'list' });
    });
});
