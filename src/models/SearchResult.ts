import { Edge } from './Edge';

export type SearchError =
    | { type: 'NodeNotFound', stationId: string }
    | { type: 'NoPathFound', origin: string, destination: string }
    | { type: 'SearchTimeout', timeoutMs: number };

export interface SearchStatistics {
    expandedNodes: number,
    // milliseconds
    duration: number,
}

export interface RouteResult {
    path: string[],
    totalSeconds: number,
    sections: Edge[],
    statistics: SearchStatistics,
}

export type SearchResult =
    | { success: true, route: RouteResult }
    | { success: false, error: SearchError, statistics: SearchStatistics };
