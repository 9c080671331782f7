import { DEFAULT_CONFIG, HeuristicConfig } from '../config';
import { Calculator } from './calculator';
import { Graph } from './graph';

/**
 * Lower bound of the travel time in seconds between two stations of the graph.
 */
export type Heuristic = (graph: Graph, u: string, v: string) => number;

export const zeroHeuristic: Heuristic = () => 0;

/**
 * Estimates the travel time by the great-circle distance and an assumed maximum speed.
 * Returns 0 if a station is unknown or has no coordinates.
 * @param config
 * @returns
 */
export function createHaversineHeuristic(config: HeuristicConfig = DEFAULT_CONFIG): Heuristic {
    return (graph: Graph, u: string, v: string): number => {
        const stationU = graph.getStation(u);
        const stationV = graph.getStation(v);
        if(stationU === undefined || stationV === undefined){
            return 0;
        }
        if(stationU.lat === null || stationU.lon === null || stationV.lat === null || stationV.lon === null){
            return 0;
        }
        const distance = Calculator.haversineDistance(stationU.lat, stationU.lon, stationV.lat, stationV.lon, config.earthRadius);
        return distance / config.assumedSpeed;
    };
}
