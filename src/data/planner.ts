import { DEFAULT_CONFIG, PlannerConfig } from '../config';
import { StopRecord, TransferRecord, TripSegmentRecord } from '../models/ScheduleRecords';
import { SearchResult } from '../models/SearchResult';
import { DataUnavailableError } from './errors';
import { Graph } from './graph';
import { GraphBuilder } from './graph-builder';
import { createHaversineHeuristic, Heuristic } from './heuristic';
import { Searcher } from './searcher';

// query surface of the schedule store used to build the graph
export interface ScheduleSource {
    getStops(): StopRecord[],
    getAggregatedTripSegments(): TripSegmentRecord[],
    getTransfers(): TransferRecord[],
}

export class Planner {
    /**
     * Pulls the stops, trip segments and transfers of the store and builds a new graph.
     * @param store
     * @param config
     * @returns
     */
    public static loadGraph(store: ScheduleSource, config: PlannerConfig = DEFAULT_CONFIG): Graph {
        const stops = store.getStops();
        if(stops.length === 0){
            throw new DataUnavailableError('schedule store contains no stops');
        }
        console.time('build graph');
        const graph = GraphBuilder.build(stops, store.getAggregatedTripSegments(), store.getTransfers(), config.defaultTransferTime);
        console.timeEnd('build graph');
        console.log(`graph built: ${graph.numberOfStations} nodes, ${graph.numberOfEdges} edges`);
        const statistics = graph.statistics;
        if(statistics.malformedRecords > 0 || statistics.danglingEdges > 0){
            console.warn(`skipped ${statistics.malformedRecords} malformed records and ${statistics.danglingEdges} edges with unknown stations`);
        }
        return graph;
    }

    /**
     * Plans the fastest route between two station ids.
     * @param graph
     * @param originId
     * @param destinationId
     * @param config
     * @param heuristic defaults to the haversine heuristic of the config
     * @returns
     */
    public static planRoute(graph: Graph, originId: string, destinationId: string, config: PlannerConfig = DEFAULT_CONFIG,
        heuristic: Heuristic = createHaversineHeuristic(config)): SearchResult {
        return Searcher.findPath(graph, originId, destinationId, {
            heuristic: heuristic,
            timeoutMs: config.searchTimeout,
        });
    }
}
