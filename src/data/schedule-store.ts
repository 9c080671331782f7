import { groupBy, minBy, sortBy } from 'lodash';
import { StopRecord, TransferRecord, TripSegmentRecord } from '../models/ScheduleRecords';
import { StopTime } from '../models/StopTime';
import { Trip } from '../models/Trip';
import { TripSegment } from '../models/TripSegment';
import { ScheduleSource } from './planner';

/**
 * Read-only snapshot of the normalized schedule tables.
 */
export class ScheduleStore implements ScheduleSource {
    private readonly stops: StopRecord[];
    private readonly trips: Map<string, Trip>;
    private readonly stopTimes: StopTime[];
    private readonly transfers: TransferRecord[];
    // rows of the feed files which couldn't be used
    public readonly skippedRows: number;

    private tripSegments: TripSegment[] | undefined;

    constructor(stops: StopRecord[], trips: Trip[], stopTimes: StopTime[], transfers: TransferRecord[], skippedRows = 0) {
        this.stops = stops;
        this.trips = new Map(trips.map(trip => [trip.id, trip]));
        this.stopTimes = stopTimes;
        this.transfers = transfers;
        this.skippedRows = skippedRows;
    }

    public isEmpty(): boolean {
        return this.stops.length === 0;
    }

    public getStops(): StopRecord[] {
        return this.stops;
    }

    public getTransfers(): TransferRecord[] {
        return this.transfers;
    }

    /**
     * Links every stop time to the next stop time of the same trip (ordered by stop sequence).
     * The last stop of a trip and stop times of unknown trips produce no segment.
     * @returns
     */
    public getTripSegments(): TripSegment[] {
        if(this.tripSegments !== undefined){
            return this.tripSegments;
        }
        const segments: TripSegment[] = [];
        const stopTimesOfTrips = groupBy(this.stopTimes, stopTime => stopTime.tripId);
        for(const tripId of Object.keys(stopTimesOfTrips)){
            const trip = this.trips.get(tripId);
            if(trip === undefined){
                continue;
            }
            const orderedStopTimes = sortBy(stopTimesOfTrips[tripId], stopTime => stopTime.stopSequence);
            for(let i = 0; i < orderedStopTimes.length - 1; i++){
                const current = orderedStopTimes[i];
                const next = orderedStopTimes[i + 1];
                const startTime = current.departureTime;
                const endTime = next.arrivalTime;
                segments.push({
                    tripId: tripId,
                    fromStopId: current.stopId,
                    toStopId: next.stopId,
                    startTime: startTime,
                    endTime: endTime,
                    duration: startTime !== undefined && endTime !== undefined ? endTime - startTime : undefined,
                    routeId: trip.routeId,
                    serviceId: trip.serviceId,
                    directionId: trip.directionId,
                });
            }
        }
        this.tripSegments = segments;
        return segments;
    }

    /**
     * Gets the minimum scheduled duration of each ordered stop pair over all trips.
     * The route is taken from the first segment with the minimum duration. Segments without a duration or with a
     * negative one are ignored; pairs without any valid duration get a null weight.
     * @returns
     */
    public getAggregatedTripSegments(): TripSegmentRecord[] {
        const segmentsOfPairs = groupBy(this.getTripSegments(), segment => JSON.stringify([segment.fromStopId, segment.toStopId]));
        const records: TripSegmentRecord[] = [];
        for(const segments of Object.values(segmentsOfPairs)){
            const fastest = minBy(segments.filter(segment => segment.duration !== undefined && segment.duration >= 0), segment => segment.duration);
            const segment = fastest ?? segments[0];
            records.push({
                from_stop_id: segment.fromStopId,
                to_stop_id: segment.toStopId,
                weight: fastest?.duration ?? null,
                route_id: segment.routeId,
            });
        }
        return records;
    }
}
