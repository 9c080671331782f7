export { DEFAULT_CONFIG, loadConfig } from './config';
export type { HeuristicConfig, PlannerConfig } from './config';
export { Calculator } from './data/calculator';
export { Converter } from './data/converter';
export { DataUnavailableError } from './data/errors';
export { Graph } from './data/graph';
export { GraphBuilder } from './data/graph-builder';
export { createHaversineHeuristic, zeroHeuristic } from './data/heuristic';
export type { Heuristic } from './data/heuristic';
export { Importer } from './data/importer';
export { Planner } from './data/planner';
export type { ScheduleSource } from './data/planner';
export { ScheduleStore } from './data/schedule-store';
export { Searcher } from './data/searcher';
export type { SearchOptions } from './data/searcher';
export type { BuildStatistics } from './models/BuildStatistics';
export type { Edge, EdgeType } from './models/Edge';
export type { StopRecord, TransferRecord, TripSegmentRecord } from './models/ScheduleRecords';
export type { RouteResult, SearchError, SearchResult, SearchStatistics } from './models/SearchResult';
export type { Station } from './models/Station';
