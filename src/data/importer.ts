import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { StopRecord, TransferRecord } from '../models/ScheduleRecords';
import { StopTime } from '../models/StopTime';
import { Trip } from '../models/Trip';
import { Converter } from './converter';
import { DataUnavailableError } from './errors';
import { ScheduleStore } from './schedule-store';

type CsvRow = Record<string, string | undefined>;

export class Importer {
    // rows which couldn't be used during the current import
    private static skippedRows = 0;

    /**
     * Imports the gtfs files of the given directory into a schedule store.
     * stops.txt is required, trips.txt, stop_times.txt and transfers.txt are optional.
     * @param directory
     * @returns
     */
    public static importScheduleData(directory: string): ScheduleStore {
        if(!existsSync(directory)){
            throw new DataUnavailableError(`gtfs directory ${directory} does not exist`);
        }
        const stopsFilename = path.join(directory, 'stops.txt');
        if(!existsSync(stopsFilename)){
            throw new DataUnavailableError(`stop table ${stopsFilename} does not exist`);
        }
        console.time('complete import');
        this.skippedRows = 0;
        const stops = this.importStops(stopsFilename);
        const trips = this.importTrips(path.join(directory, 'trips.txt'));
        const stopTimes = this.importStopTimes(path.join(directory, 'stop_times.txt'));
        const transfers = this.importTransfers(path.join(directory, 'transfers.txt'));
        console.timeEnd('complete import');
        if(this.skippedRows > 0){
            console.warn(`skipped ${this.skippedRows} unusable rows`);
        }
        const store = new ScheduleStore(stops, trips, stopTimes, transfers, this.skippedRows);
        if(store.isEmpty()){
            throw new DataUnavailableError(`no stops found in ${directory}`);
        }
        return store;
    }

    /**
     * Reads a csv file with header. Returns undefined if the file doesn't exist.
     * @param filename
     * @returns
     */
    private static readTable(filename: string): CsvRow[] | undefined {
        if(!existsSync(filename)){
            return undefined;
        }
        const rows: CsvRow[] = parse(readFileSync(filename, 'utf-8'), {
            columns: true,
            skip_empty_lines: true,
            trim: true,
            bom: true,
            relax_column_count: true,
        });
        return rows;
    }

    /**
     * Imports the stop table. Stops without coordinates are kept with null values.
     */
    private static importStops(filename: string): StopRecord[] {
        console.time('import stops table');
        const importedStops: StopRecord[] = [];
        for(const row of this.readTable(filename) ?? []){
            const id = row.stop_id;
            if(!id){
                this.skippedRows++;
                continue;
            }
            importedStops.push({
                stop_id: id,
                stop_name: row.stop_name || id,
                stop_lat: this.parseNumber(row.stop_lat),
                stop_lon: this.parseNumber(row.stop_lon),
            });
        }
        console.timeEnd('import stops table');
        return importedStops;
    }

    /**
     * Imports the trips table.
     */
    private static importTrips(filename: string): Trip[] {
        console.time('import trips table');
        const importedTrips: Trip[] = [];
        for(const row of this.readTable(filename) ?? []){
            const id = row.trip_id;
            const routeId = row.route_id;
            // trips without route can't be linked to segments
            if(!id || !routeId){
                this.skippedRows++;
                continue;
            }
            importedTrips.push({
                id: id,
                routeId: routeId,
                serviceId: row.service_id ?? '',
                directionId: this.parseNumber(row.direction_id),
            });
        }
        console.timeEnd('import trips table');
        return importedTrips;
    }

    /**
     * Imports the stop times table. Converts arrival and departure times to seconds.
     */
    private static importStopTimes(filename: string): StopTime[] {
        console.time('import stop times table');
        const importedStopTimes: StopTime[] = [];
        for(const row of this.readTable(filename) ?? []){
            const tripId = row.trip_id;
            const stopId = row.stop_id;
            const stopSequence = this.parseNumber(row.stop_sequence);
            if(!tripId || !stopId || stopSequence === null){
                this.skippedRows++;
                continue;
            }
            importedStopTimes.push({
                tripId: tripId,
                arrivalTime: Converter.timeToSeconds(row.arrival_time),
                departureTime: Converter.timeToSeconds(row.departure_time),
                stopId: stopId,
                stopSequence: stopSequence,
            });
        }
        console.timeEnd('import stop times table');
        return importedStopTimes;
    }

    /**
     * Imports the transfers table.
     */
    private static importTransfers(filename: string): TransferRecord[] {
        console.time('import transfers table');
        const importedTransfers: TransferRecord[] = [];
        for(const row of this.readTable(filename) ?? []){
            const fromStopId = row.from_stop_id;
            const toStopId = row.to_stop_id;
            if(!fromStopId || !toStopId){
                this.skippedRows++;
                continue;
            }
            importedTransfers.push({
                from_stop_id: fromStopId,
                to_stop_id: toStopId,
                min_transfer_time: this.parseNumber(row.min_transfer_time),
            });
        }
        console.timeEnd('import transfers table');
        return importedTransfers;
    }

    private static parseNumber(value: string | undefined): number | null {
        if(value === undefined || value === ''){
            return null;
        }
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
}
