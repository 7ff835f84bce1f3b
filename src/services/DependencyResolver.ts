import { CircularDependencyError, MalformedQueryError } from '../errors';
import type { JsonObject } from '../lib/json';
import { parseQuery } from '../query/QueryParser';
import { collectReferences } from '../query/references';
import type { DependencyEdge } from '../types';

/**
 * Card ids stored once in an arena; edges are adjacency lists of arena indexes.
 */
export class DependencyGraph {
    private ids: number[] = [];
    private index = new Map<number, number>();
    private adjacency: number[][] = [];

    addNode(id: number): number {
        const existing = this.index.get(id);
        if (existing !== undefined) return existing;
        const slot = this.ids.length;
        this.ids.push(id);
        this.index.set(id, slot);
        this.adjacency.push([]);
        return slot;
    }

    addEdge(from: number, to: number): void {
        const a = this.addNode(from);
        const b = this.addNode(to);
        if (!this.adjacency[a].includes(b)) this.adjacency[a].push(b);
    }

    has(id: number): boolean {
        return this.index.has(id);
    }

    nodes(): number[] {
        return [...this.ids];
    }

    dependenciesOf(id: number): number[] {
        const slot = this.index.get(id);
        if (slot === undefined) return [];
        return this.adjacency[slot].map(i => this.ids[i]);
    }

    edges(): DependencyEdge[] {
        const out: DependencyEdge[] = [];
        this.adjacency.forEach((targets, from) => {
            for (const to of targets) out.push({ from: this.ids[from], to: this.ids[to] });
        });
        return out;
    }

    /** Transitive dependencies of `root`, excluding the root itself. */
    closureOf(root: number): number[] {
        const seen = new Set<number>();
        const stack = [...this.dependenciesOf(root)];
        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined || seen.has(id)) continue;
            seen.add(id);
            stack.push(...this.dependenciesOf(id));
        }
        seen.delete(root);
        return Array.from(seen).sort((a, b) => a - b);
    }

    static fromEdges(edges: DependencyEdge[]): DependencyGraph {
        const graph = new DependencyGraph();
        for (const edge of edges) graph.addEdge(edge.from, edge.to);
        return graph;
    }
}

/** Returns the card's dataset_query, or null when the card does not exist. */
export type CardLoader = (cardId: number) => Promise<JsonObject | null> | JsonObject | null;

export interface Resolution {
    /** Dependencies before dependents. */
    order: number[];
    cycles: CircularDependencyError[];
    /** Referenced ids the loader could not find. */
    missing: number[];
    graph: DependencyGraph;
}

export class DependencyResolver {
    /** Card ids a query references directly, sorted and unique. */
    static directDependencies(datasetQuery: JsonObject): number[] {
        return collectReferences(parseQuery(datasetQuery)).cards;
    }

    async resolve(roots: number[], load: CardLoader): Promise<Resolution> {
        const graph = new DependencyGraph();
        const visited = new Set<number>();
        const onPath: number[] = [];
        const order: number[] = [];
        const cycles: CircularDependencyError[] = [];
        const missing: number[] = [];

        const visit = async (id: number): Promise<void> => {
            visited.add(id);
            onPath.push(id);

            const query = await load(id);
            if (query === null) {
                missing.push(id);
            } else {
                for (const dep of dependenciesOrNone(id, query)) {
                    const cycleStart = onPath.indexOf(dep);
                    if (cycleStart !== -1) {
                        const cycle = new CircularDependencyError([...onPath.slice(cycleStart), dep]);
                        console.warn(`⚠️  ${cycle.message}`);
                        cycles.push(cycle);
                        graph.addNode(dep);
                        continue;
                    }
                    graph.addEdge(id, dep);
                    if (!visited.has(dep)) await visit(dep);
                }
                order.push(id);
            }

            onPath.pop();
        };

        for (const root of [...roots].sort((a, b) => a - b)) {
            graph.addNode(root);
            if (!visited.has(root)) await visit(root);
        }

        return { order, cycles, missing, graph };
    }
}

/** A card whose query cannot be parsed has no usable dependencies; it fails later, at rewrite. */
function dependenciesOrNone(cardId: number, query: JsonObject): number[] {
    try {
        return DependencyResolver.directDependencies(query);
    } catch (error) {
        if (!(error instanceof MalformedQueryError)) throw error;
        console.warn(`⚠️  Card ${cardId}: ${error.message}`);
        return [];
    }
}
