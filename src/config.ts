import path from 'path';
import { ASSUMED_SPEED_MPS, DEFAULT_CORS_ORIGIN, DEFAULT_PORT, DEFAULT_TRANSFER_TIME, EARTH_RADIUS_METERS } from './constants';

export interface HeuristicConfig {
    earthRadius: number,
    assumedSpeed: number,
}

export interface PlannerConfig extends HeuristicConfig {
    port: number,
    gtfsDirectory: string,
    corsOrigin: string,
    defaultTransferTime: number,
    // no limit if undefined
    searchTimeout?: number,
}

export const DEFAULT_GTFS_DIRECTORY: string = path.join(__dirname, '../data');

export const DEFAULT_CONFIG: PlannerConfig = {
    port: DEFAULT_PORT,
    gtfsDirectory: DEFAULT_GTFS_DIRECTORY,
    corsOrigin: DEFAULT_CORS_ORIGIN,
    defaultTransferTime: DEFAULT_TRANSFER_TIME,
    earthRadius: EARTH_RADIUS_METERS,
    assumedSpeed: ASSUMED_SPEED_MPS,
}

/**
 * Builds the planner configuration from the defaults and the given environment variables.
 * Values which are no positive numbers are ignored.
 * @param env
 * @returns
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
    return {
        port: positiveNumber(env.PORT) ?? DEFAULT_CONFIG.port,
        gtfsDirectory: env.GTFS_DIRECTORY || DEFAULT_CONFIG.gtfsDirectory,
        corsOrigin: env.CORS_ORIGIN || DEFAULT_CONFIG.corsOrigin,
        defaultTransferTime: positiveNumber(env.DEFAULT_TRANSFER_TIME) ?? DEFAULT_CONFIG.defaultTransferTime,
        earthRadius: DEFAULT_CONFIG.earthRadius,
        assumedSpeed: positiveNumber(env.ASSUMED_SPEED_MPS) ?? DEFAULT_CONFIG.assumedSpeed,
        searchTimeout: positiveNumber(env.SEARCH_TIMEOUT_MS),
    }
}

function positiveNumber(value: string | undefined): number | undefined {
    if(value === undefined || value.trim() === ''){
        return undefined;
    }
    const n = Number(value);
    if(!Number.isFinite(n) || n <= 0){
        return undefined;
    }
    return n;
}
