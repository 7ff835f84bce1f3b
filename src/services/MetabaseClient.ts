import axios, { AxiosAdapter, AxiosInstance, Method } from 'axios';
import { z } from 'zod';
import {
    RemotePermanentError,
    RemoteTransientError,
    RetryBudgetExhaustedError,
    describeError
} from '../errors';
import { jsonObjectSchema, jsonValueSchema, type JsonObject, type JsonValue } from '../lib/json';
import {
    collectionItemsSchema,
    collectionNodeSchema,
    createdEntitySchema,
    databaseListSchema,
    databaseMetadataSchema,
    type CollectionItem,
    type CollectionNode,
    type CreatedEntity,
    type DatabaseMetadata,
    type DatabaseSummary
} from '../types';

/** The remote operations export and import depend on. */
export interface MetabaseApi {
    readonly baseUrl: string;
    getDatabases(): Promise<DatabaseSummary[]>;
    getDatabaseMetadata(databaseId: number): Promise<DatabaseMetadata>;
    getCollectionsTree(includeArchived?: boolean): Promise<CollectionNode[]>;
    getCollectionItems(collectionId: number | 'root'): Promise<CollectionItem[]>;
    getCard(cardId: number): Promise<JsonObject>;
    createCard(payload: JsonObject): Promise<CreatedEntity>;
    updateCard(cardId: number, payload: JsonObject): Promise<CreatedEntity>;
    getDashboard(dashboardId: number): Promise<JsonObject>;
    createDashboard(payload: JsonObject): Promise<CreatedEntity>;
    updateDashboard(dashboardId: number, payload: JsonObject): Promise<CreatedEntity>;
    createCollection(payload: JsonObject): Promise<CreatedEntity>;
    updateCollection(collectionId: number, payload: JsonObject): Promise<CreatedEntity>;
}

export interface RetryPolicy {
    /** Attempts per request, the first one included. */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

/** Retries left for the whole run, shared by every client of that run. */
export class RetryBudget {
    private used = 0;

    constructor(readonly total: number) {}

    take(): boolean {
        if (this.used >= this.total) return false;
        this.used++;
        return true;
    }

    get remaining(): number {
        return this.total - this.used;
    }
}

export interface MetabaseClientOptions {
    baseUrl: string;
    apiKey: string;
    retry?: Partial<RetryPolicy>;
    budget?: RetryBudget;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 };

export function isNotFound(error: unknown): boolean {
    return error instanceof RemotePermanentError && error.status === 404;
}

export class MetabaseClient implements MetabaseApi {
    readonly baseUrl: string;
    private client: AxiosInstance;
    private retry: RetryPolicy;
    private budget: RetryBudget;
    private sleep: (ms: number) => Promise<void>;

    constructor(options: MetabaseClientOptions) {
        if (!options.baseUrl || !options.apiKey) {
            throw new Error('Metabase configuration missing: both a base URL and an API key are required.');
        }

        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.retry = { ...DEFAULT_RETRY, ...options.retry };
        this.budget = options.budget ?? new RetryBudget(50);
        this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));

        this.client = axios.create({
            baseURL: this.baseUrl,
            timeout: options.timeoutMs ?? 60000,
            adapter: options.adapter,
            headers: {
                'Content-Type': 'application/json',
                'x-api-key': options.apiKey,
            },
        });
    }

    async validateConnection(): Promise<boolean> {
        try {
            await this.request('get', '/api/user/current');
            return true;
        } catch (error) {
            console.error(`Failed to connect to Metabase at ${this.baseUrl}: ${describeError(error)}`);
            return false;
        }
    }

    // ======================
    // PRIMITIVES
    // ======================

    list(resource: string, params?: Record<string, string | number | boolean>): Promise<JsonValue> {
        return this.request('get', `/api/${resource}`, undefined, params);
    }

    get(resource: string, id: number | string, params?: Record<string, string | number | boolean>): Promise<JsonValue> {
        return this.request('get', `/api/${resource}/${id}`, undefined, params);
    }

    create(resource: string, payload: JsonObject): Promise<JsonValue> {
        return this.request('post', `/api/${resource}`, payload);
    }

    update(resource: string, id: number | string, payload: JsonObject): Promise<JsonValue> {
        return this.request('put', `/api/${resource}/${id}`, payload);
    }

    // ======================
    // TYPED WRAPPERS
    // ======================

    async getDatabases(): Promise<DatabaseSummary[]> {
        return this.parse(databaseListSchema, await this.list('database'), 'database list');
    }

    async getDatabaseMetadata(databaseId: number): Promise<DatabaseMetadata> {
        const data = await this.get('database', `${databaseId}/metadata`, { include_hidden: true });
        return this.parse(databaseMetadataSchema, data, `metadata of database ${databaseId}`);
    }

    async getCollectionsTree(includeArchived = false): Promise<CollectionNode[]> {
        const data = await this.list('collection/tree', { 'exclude-archived': !includeArchived });
        return this.parse(z.array(collectionNodeSchema), data, 'collection tree');
    }

    async getCollectionItems(collectionId: number | 'root'): Promise<CollectionItem[]> {
        const data = await this.get('collection', `${collectionId}/items`);
        return this.parse(collectionItemsSchema, data, `items of collection ${collectionId}`);
    }

    async getCard(cardId: number): Promise<JsonObject> {
        return this.parse(jsonObjectSchema, await this.get('card', cardId), `card ${cardId}`);
    }

    async createCard(payload: JsonObject): Promise<CreatedEntity> {
        return this.parse(createdEntitySchema, await this.create('card', payload), 'created card');
    }

    async updateCard(cardId: number, payload: JsonObject): Promise<CreatedEntity> {
        return this.parse(createdEntitySchema, await this.update('card', cardId, payload), `updated card ${cardId}`);
    }

    async getDashboard(dashboardId: number): Promise<JsonObject> {
        return this.parse(jsonObjectSchema, await this.get('dashboard', dashboardId), `dashboard ${dashboardId}`);
    }

    async createDashboard(payload: JsonObject): Promise<CreatedEntity> {
        return this.parse(createdEntitySchema, await this.create('dashboard', payload), 'created dashboard');
    }

    async updateDashboard(dashboardId: number, payload: JsonObject): Promise<CreatedEntity> {
        const data = await this.update('dashboard', dashboardId, payload);
        return this.parse(createdEntitySchema, data, `updated dashboard ${dashboardId}`);
    }

    async createCollection(payload: JsonObject): Promise<CreatedEntity> {
        return this.parse(createdEntitySchema, await this.create('collection', payload), 'created collection');
    }

    async updateCollection(collectionId: number, payload: JsonObject): Promise<CreatedEntity> {
        const data = await this.update('collection', collectionId, payload);
        return this.parse(createdEntitySchema, data, `updated collection ${collectionId}`);
    }

    // ======================
    // TRANSPORT
    // ======================

    private async request(
        method: Method,
        url: string,
        data?: JsonObject,
        params?: Record<string, string | number | boolean>
    ): Promise<JsonValue> {
        const label = `${method.toUpperCase()} ${url}`;
        for (let attempt = 1; ; attempt++) {
            try {
                const response = await this.client.request<unknown>({ method, url, data, params });
                return this.parse(jsonValueSchema, response.data ?? null, label);
            } catch (error) {
                const failure = classify(error, label);
                if (attempt >= this.retry.maxAttempts) {
                    throw new RemotePermanentError(
                        `${failure.message} (gave up after ${attempt} attempts)`,
                        failure.status,
                        failure
                    );
                }
                if (!this.budget.take()) {
                    throw new RetryBudgetExhaustedError(this.budget.total, failure);
                }

                const backoff = this.retry.baseDelayMs * 2 ** (attempt - 1);
                const delay = Math.min(this.retry.maxDelayMs, failure.retryAfterMs ?? backoff);
                console.warn(`↻ ${failure.message}; retry ${attempt}/${this.retry.maxAttempts - 1} in ${delay}ms`);
                await this.sleep(delay);
            }
        }
    }

    private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
        const result = schema.safeParse(data);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw new RemotePermanentError(`Unexpected response for ${what}${where}: ${issue?.message ?? 'invalid'}`, null);
        }
        return result.data;
    }
}

/**
 * Network errors, 429 and 5xx come back as transient failures; any other
 * error is thrown from here as permanent.
 */
function classify(error: unknown, label: string): RemoteTransientError & { retryAfterMs: number | null } {
    if (!axios.isAxiosError(error)) {
        if (error instanceof RemotePermanentError) throw error;
        throw new RemotePermanentError(`${label} failed: ${describeError(error)}`, null, error);
    }

    const status = error.response?.status ?? null;
    const body: unknown = error.response?.data;
    const message = `${label} failed${status !== null ? ` with ${status}` : ''}: ${detailOf(body) ?? error.message}`;
    if (status !== null && status !== 429 && status < 500) {
        throw new RemotePermanentError(message, status, error);
    }

    const retryAfter = Number(error.response?.headers?.['retry-after']);
    return Object.assign(new RemoteTransientError(message, status, error), {
        retryAfterMs: Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : null,
    });
}

function detailOf(body: unknown): string | null {
    if (typeof body === 'string' && body.length > 0) return body.slice(0, 200);
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
    }
    return null;
}
