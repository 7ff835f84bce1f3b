import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { DatabaseMap, DatabaseMetadata } from '../../types';
import { FakeMetabase } from './FakeMetabase';

export async function tempDir(prefix = 'porter-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export const sourceWarehouse: DatabaseMetadata = {
    id: 1,
    name: 'warehouse',
    tables: [
        {
            id: 10,
            name: 'orders',
            schema: 'public',
            fields: [
                { id: 100, name: 'id' },
                { id: 101, name: 'total' },
                { id: 102, name: 'created_at' },
            ],
        },
        {
            id: 11,
            name: 'customers',
            schema: 'public',
            fields: [
                { id: 110, name: 'id' },
                { id: 111, name: 'region' },
            ],
        },
    ],
};

export function targetWarehouse(withCustomers = true): DatabaseMetadata {
    const tables: DatabaseMetadata['tables'] = [
        {
            id: 50,
            name: 'orders',
            schema: 'public',
            fields: [
                { id: 500, name: 'id' },
                { id: 501, name: 'total' },
                { id: 502, name: 'created_at' },
            ],
        },
    ];
    if (withCustomers) {
        tables.push({
            id: 51,
            name: 'customers',
            schema: 'public',
            fields: [
                { id: 510, name: 'id' },
                { id: 511, name: 'region' },
            ],
        });
    }
    return { id: 5, name: 'warehouse-prod', tables };
}

/**
 * Sales (4) holds the model 20, the native card 23 and the dashboard 30; its child
 * Regional (6) holds card 21. Card 22 lives in Ops (9).
 */
export function sourceInstance(): FakeMetabase {
    const source = new FakeMetabase('http://source.test', 5000);
    source.databases = [sourceWarehouse, { id: 2, name: 'scratch', tables: [] }];
    source.collections = [
        { id: 4, name: 'Sales', description: 'Sales reporting', parent_id: null },
        { id: 6, name: 'Regional', description: null, parent_id: 4 },
        { id: 9, name: 'Ops', description: null, parent_id: null },
        { id: 12, name: "Ana's Personal Collection", description: null, parent_id: null, personal_owner_id: 3 },
    ];

    source.cards.set(20, {
        id: 20,
        name: 'Orders base',
        type: 'model',
        collection_id: 4,
        database_id: 1,
        table_id: 10,
        display: 'table',
        visualization_settings: { 'table.pivot': false, column_settings: { '["ref",["field",101,null]]': {} } },
        result_metadata: [{ name: 'total', id: 101, table_id: 10, field_ref: ['field', 101, null] }],
        dataset_query: { database: 1, type: 'query', query: { 'source-table': 10 } },
    });
    source.cards.set(21, {
        id: 21,
        name: 'Revenue by region',
        collection_id: 6,
        database_id: 1,
        display: 'bar',
        visualization_settings: {},
        dataset_query: {
            'lib/type': 'mbql/query',
            database: 1,
            stages: [
                {
                    'lib/type': 'mbql.stage/mbql',
                    'source-card': 20,
                    joins: [
                        {
                            alias: 'C',
                            stages: [{ 'lib/type': 'mbql.stage/mbql', 'source-table': 11 }],
                            conditions: [['=', {}, ['field', {}, 'customer_id'], ['field', { 'join-alias': 'C' }, 110]]],
                        },
                    ],
                    breakout: [['field', { 'join-alias': 'C' }, 111]],
                },
            ],
        },
    });
    source.cards.set(22, {
        id: 22,
        name: 'Customers',
        collection_id: 9,
        database_id: 1,
        table_id: 11,
        display: 'table',
        dataset_query: { database: 1, type: 'query', query: { 'source-table': 11 } },
    });
    source.cards.set(23, {
        id: 23,
        name: 'Top customers SQL',
        collection_id: 4,
        database_id: 1,
        display: 'table',
        dataset_query: {
            database: 1,
            type: 'native',
            native: {
                query: 'select * from {{#22-customers}} limit 10',
                'template-tags': {
                    '#22-customers': {
                        type: 'card',
                        'card-id': 22,
                        name: '#22-customers',
                        'display-name': '#22 Customers',
                        id: 'tag-1',
                    },
                },
            },
        },
    });

    source.dashboards.set(30, {
        id: 30,
        name: 'Sales overview',
        collection_id: 4,
        parameters: [{ id: 'p1', name: 'Total', type: 'number/=' }],
        dashcards: [
            {
                id: 1,
                card_id: 20,
                col: 0,
                row: 0,
                size_x: 6,
                size_y: 4,
                parameter_mappings: [{ parameter_id: 'p1', card_id: 20, target: ['dimension', ['field', 101, null]] }],
            },
            { id: 2, card_id: 21, col: 6, row: 0, size_x: 6, size_y: 4 },
        ],
    });
    return source;
}

export function targetInstance(withCustomers = true): FakeMetabase {
    const target = new FakeMetabase('http://target.test', 1000);
    target.databases = [targetWarehouse(withCustomers)];
    return target;
}

export const dbMap: DatabaseMap = { by_id: { '1': 5 }, by_name: {} };
