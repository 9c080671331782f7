import FastPriorityQueue from 'fastpriorityqueue';
import { performance } from 'perf_hooks';
import { Edge } from '../models/Edge';
import { SearchError, SearchResult, SearchStatistics } from '../models/SearchResult';
import { Graph } from './graph';
import { createHaversineHeuristic, Heuristic } from './heuristic';

// entries of the frontier
interface FrontierEntry {
    stationId: string,
    // cost from the origin when the entry was added
    g: number,
    // g + estimated cost to the destination
    f: number,
    // position of the entry in the insertion order
    insertion: number,
}

export interface SearchOptions {
    heuristic?: Heuristic,
    // milliseconds, no limit if undefined
    timeoutMs?: number,
}

/**
 * A* search over a graph. The state of the last search stays accessible until the next search starts.
 */
export class Searcher {
    private readonly graph: Graph;
    private readonly heuristic: Heuristic;

    // discovered stations which are not finalized yet, sorted by f and insertion order
    private frontier = Searcher.createFrontier();
    private finalized = new Set<string>();
    // best known cost from the origin of each discovered station
    private bestCosts = new Map<string, number>();
    // edge used to reach each discovered station
    private predecessors = new Map<string, Edge>();
    private insertionCounter = 0;
    private expandedNodes = 0;

    constructor(graph: Graph, heuristic: Heuristic = createHaversineHeuristic()) {
        this.graph = graph;
        this.heuristic = heuristic;
    }

    /**
     * Finds the route with the minimum travel time between origin and destination.
     * @param graph
     * @param origin
     * @param destination
     * @param options
     * @returns
     */
    public static findPath(graph: Graph, origin: string, destination: string, options: SearchOptions = {}): SearchResult {
        return new Searcher(graph, options.heuristic).search(origin, destination, options.timeoutMs);
    }

    public search(origin: string, destination: string, timeoutMs?: number): SearchResult {
        const startTime = performance.now();
        this.init();
        for(const stationId of [origin, destination]){
            if(!this.graph.hasStation(stationId)){
                return this.failure({ type: 'NodeNotFound', stationId: stationId }, startTime);
            }
        }

        this.bestCosts.set(origin, 0);
        this.addToFrontier(origin, 0, destination);

        while(!this.frontier.isEmpty()){
            if(timeoutMs !== undefined && performance.now() - startTime > timeoutMs){
                return this.failure({ type: 'SearchTimeout', timeoutMs: timeoutMs }, startTime);
            }
            const entry = this.frontier.poll();
            if(entry === undefined){
                break;
            }
            const stationId = entry.stationId;
            if(stationId === destination){
                const sections = this.reconstructSections(destination);
                return {
                    success: true,
                    route: {
                        path: [origin, ...sections.map(section => section.to)],
                        totalSeconds: entry.g,
                        sections: sections,
                        statistics: this.getStatistics(startTime),
                    },
                };
            }
            // outdated entry of an already expanded station
            if(this.finalized.has(stationId)){
                continue;
            }
            this.finalized.add(stationId);
            this.expandedNodes++;
            this.relaxEdges(stationId, entry.g, destination);
        }
        return this.failure({ type: 'NoPathFound', origin: origin, destination: destination }, startTime);
    }

    public isFinalized(stationId: string): boolean {
        return this.finalized.has(stationId);
    }

    public getBestCost(stationId: string): number | undefined {
        return this.bestCosts.get(stationId);
    }

    public getPredecessor(stationId: string): string | undefined {
        return this.predecessors.get(stationId)?.from;
    }

    public getFrontierSize(): number {
        return this.frontier.size;
    }

    private static createFrontier(): FastPriorityQueue<FrontierEntry> {
        return new FastPriorityQueue<FrontierEntry>((a, b) => {
            return a.f < b.f || (a.f === b.f && a.insertion < b.insertion);
        });
    }

    private init(): void {
        this.frontier = Searcher.createFrontier();
        this.finalized = new Set<string>();
        this.bestCosts = new Map<string, number>();
        this.predecessors = new Map<string, Edge>();
        this.insertionCounter = 0;
        this.expandedNodes = 0;
    }

    /**
     * Updates the costs of all neighbours which can be reached faster through the given station.
     * @param stationId
     * @param g
     * @param destination
     */
    private relaxEdges(stationId: string, g: number, destination: string): void {
        for(const edge of this.graph.getOutgoingEdges(stationId)){
            const candidate = g + edge.weight;
            const knownCost = this.bestCosts.get(edge.to);
            if(knownCost === undefined || candidate < knownCost){
                this.bestCosts.set(edge.to, candidate);
                this.predecessors.set(edge.to, edge);
                this.addToFrontier(edge.to, candidate, destination);
            }
        }
    }

    private addToFrontier(stationId: string, g: number, destination: string): void {
        this.frontier.add({
            stationId: stationId,
            g: g,
            f: g + this.heuristic(this.graph, stationId, destination),
            insertion: this.insertionCounter++,
        });
    }

    /**
     * Follows the predecessor edges from the destination back to the origin.
     * @param destination
     * @returns
     */
    private reconstructSections(destination: string): Edge[] {
        const sections: Edge[] = [];
        let edge = this.predecessors.get(destination);
        while(edge !== undefined){
            sections.unshift(edge);
            edge = this.predecessors.get(edge.from);
        }
        return sections;
    }

    private failure(error: SearchError, startTime: number): SearchResult {
        return { success: false, error: error, statistics: this.getStatistics(startTime) };
    }

    private getStatistics(startTime: number): SearchStatistics {
        return {
            expandedNodes: this.expandedNodes,
            duration: performance.now() - startTime,
        };
    }
}
