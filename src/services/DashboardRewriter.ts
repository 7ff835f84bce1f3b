import { MappingTable } from './MappingTable';
import { QueryRewriter } from './QueryRewriter';
import { RemapError } from '../errors';
import { isInteger, isJsonObject, type JsonObject, type JsonValue } from '../lib/json';

const LAYOUT_KEYS = ['col', 'row', 'size_x', 'size_y', 'visualization_settings', 'action_id', 'inline_parameters'];

export interface DashboardRewriteResult {
    /** Top-level properties for create/update, without dashcards or tabs. */
    dashboard: JsonObject;
    dashcards: JsonObject[];
    tabs: JsonObject[];
    warnings: string[];
}

/** Dashcards live under `dashcards` on current platforms and `ordered_cards` on older ones. */
export function dashcardsOf(body: JsonObject): JsonObject[] {
    const cards = Array.isArray(body.dashcards) ? body.dashcards : body.ordered_cards;
    return Array.isArray(cards) ? cards.filter(isJsonObject) : [];
}

export class DashboardRewriter {
    constructor(
        private mapping: MappingTable,
        private queries: QueryRewriter
    ) {}

    /** Card ids a dashboard needs: dashcards, their series, and parameter value sources. */
    static referencedCards(body: JsonObject): number[] {
        const ids = new Set<number>();
        for (const dashcard of dashcardsOf(body)) {
            if (isInteger(dashcard.card_id)) ids.add(dashcard.card_id);
            for (const series of arrayOf(dashcard.series)) {
                if (isJsonObject(series) && isInteger(series.id)) ids.add(series.id);
            }
        }
        for (const parameter of arrayOf(body.parameters)) {
            if (!isJsonObject(parameter)) continue;
            const config = parameter.values_source_config;
            if (isJsonObject(config) && isInteger(config.card_id)) ids.add(config.card_id);
        }
        return Array.from(ids).sort((a, b) => a - b);
    }

    rewrite(body: JsonObject): DashboardRewriteResult {
        const warnings: string[] = [];

        const dashboard: JsonObject = {
            name: typeof body.name === 'string' ? body.name : 'Untitled dashboard',
            description: body.description ?? null,
            collection_id: this.collectionId(body.collection_id),
            parameters: arrayOf(body.parameters).map((p, i) => this.rewriteParameter(p, i, warnings)),
        };
        for (const key of ['width', 'auto_apply_filters', 'cache_ttl', 'collection_position']) {
            const value = body[key];
            if (value !== undefined) dashboard[key] = value;
        }

        const tabIds = new Map<number, number>();
        const tabs = arrayOf(body.tabs).filter(isJsonObject).map((tab, i): JsonObject => {
            const tempId = -(i + 1);
            if (isInteger(tab.id)) tabIds.set(tab.id, tempId);
            return { id: tempId, name: tab.name ?? `Tab ${i + 1}`, position: tab.position ?? i };
        });

        const dashcards: JsonObject[] = [];
        for (const dashcard of dashcardsOf(body)) {
            const rewritten = this.rewriteDashcard(dashcard, -(dashcards.length + 1), tabIds, warnings);
            if (rewritten) dashcards.push(rewritten);
        }

        return { dashboard, dashcards, tabs, warnings };
    }

    private collectionId(value: JsonValue | undefined): number | null {
        if (!isInteger(value)) return null;
        const target = this.mapping.lookup('collection', value);
        if (target === undefined) {
            throw new RemapError('$.collection_id', 'collection', value);
        }
        return target;
    }

    private rewriteDashcard(
        dashcard: JsonObject,
        tempId: number,
        tabIds: Map<number, number>,
        warnings: string[]
    ): JsonObject | null {
        const out: JsonObject = { id: tempId, card_id: null };
        for (const key of LAYOUT_KEYS) {
            const value = dashcard[key];
            if (value !== undefined) out[key] = value;
        }
        if (isInteger(dashcard.dashboard_tab_id)) {
            out.dashboard_tab_id = tabIds.get(dashcard.dashboard_tab_id) ?? null;
        }

        const sourceCardId = dashcard.card_id;
        if (isInteger(sourceCardId)) {
            const targetCardId = this.mapping.lookup('card', sourceCardId);
            if (targetCardId === undefined) {
                warnings.push(`Skipped dashcard for card ${sourceCardId}: card is not mapped`);
                return null;
            }
            out.card_id = targetCardId;
        }

        out.series = arrayOf(dashcard.series).flatMap(series => {
            if (!isJsonObject(series) || !isInteger(series.id)) return [];
            const target = this.mapping.lookup('card', series.id);
            if (target === undefined) {
                warnings.push(`Dropped series card ${series.id}: card is not mapped`);
                return [];
            }
            return [{ id: target }];
        });

        out.parameter_mappings = arrayOf(dashcard.parameter_mappings).flatMap(pm => {
            if (!isJsonObject(pm)) return [];
            const rewritten = this.rewriteParameterMapping(pm, out.card_id, warnings);
            return rewritten ? [rewritten] : [];
        });
        return out;
    }

    private rewriteParameterMapping(mapping: JsonObject, targetCardId: JsonValue, warnings: string[]): JsonObject | null {
        const out: JsonObject = { ...mapping, card_id: targetCardId };
        const target = mapping.target;
        if (!Array.isArray(target) || target[0] !== 'dimension' || target.length < 2) {
            return out;
        }
        try {
            const ref = this.queries.rewriteFieldRef(target[1], '$.target[1]');
            out.target = [target[0], ref, ...target.slice(2)];
            return out;
        } catch (error) {
            if (!(error instanceof RemapError)) throw error;
            warnings.push(`Dropped parameter mapping ${String(mapping.parameter_id)}: ${error.message}`);
            return null;
        }
    }

    private rewriteParameter(parameter: JsonValue, index: number, warnings: string[]): JsonValue {
        if (!isJsonObject(parameter)) return parameter;
        const config = parameter.values_source_config;
        if (!isJsonObject(config) || !isInteger(config.card_id)) return parameter;

        const label = typeof parameter.name === 'string' ? parameter.name : `#${index}`;
        const targetCardId = this.mapping.lookup('card', config.card_id);
        if (targetCardId === undefined) {
            warnings.push(`Parameter ${label}: value source card ${config.card_id} is not mapped; source removed`);
            return { ...parameter, values_source_type: null, values_source_config: {} };
        }

        const rewritten: JsonObject = { ...config, card_id: targetCardId };
        if (config.value_field !== undefined) {
            try {
                rewritten.value_field = this.queries.rewriteFieldRef(config.value_field, '$.values_source_config.value_field');
            } catch (error) {
                if (!(error instanceof RemapError)) throw error;
                warnings.push(`Parameter ${label}: ${error.message}; source removed`);
                return { ...parameter, values_source_type: null, values_source_config: {} };
            }
        }
        return { ...parameter, values_source_config: rewritten };
    }
}

function arrayOf(value: JsonValue | undefined): JsonValue[] {
    return Array.isArray(value) ? value : [];
}
