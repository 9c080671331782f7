import { DEFAULT_TRANSFER_TIME } from '../constants';
import { BuildStatistics } from '../models/BuildStatistics';
import { Edge } from '../models/Edge';
import { StopRecord, TransferRecord, TripSegmentRecord } from '../models/ScheduleRecords';
import { Station } from '../models/Station';
import { Graph } from './graph';

export class GraphBuilder {
    private readonly stations = new Map<string, Station>();
    private readonly edges = new Map<string, Edge>();
    private readonly statistics: BuildStatistics = {
        malformedRecords: 0,
        danglingEdges: 0,
        selfLoops: 0,
        overwrittenEdges: 0,
    };

    constructor(private readonly defaultTransferTime: number = DEFAULT_TRANSFER_TIME) {}

    /**
     * Builds the graph from the schedule records. Travel edges are added before transfer edges, so a transfer
     * replaces a travel edge between the same ordered pair of stations.
     * @param stops
     * @param travelRecords
     * @param transferRecords
     * @param defaultTransferTime used for transfers without a positive minimum transfer time
     * @returns
     */
    public static build(stops: StopRecord[], travelRecords: TripSegmentRecord[], transferRecords: TransferRecord[],
        defaultTransferTime: number = DEFAULT_TRANSFER_TIME): Graph {
        const builder = new GraphBuilder(defaultTransferTime);
        builder.addStations(stops);
        builder.addTravelEdges(travelRecords);
        builder.addTransferEdges(transferRecords);
        return builder.toGraph();
    }

    public addStations(stops: StopRecord[]): void {
        for(const stop of stops){
            if(!stop.stop_id){
                this.statistics.malformedRecords++;
                continue;
            }
            this.stations.set(stop.stop_id, {
                id: stop.stop_id,
                name: stop.stop_name || stop.stop_id,
                lat: this.toCoordinate(stop.stop_lat),
                lon: this.toCoordinate(stop.stop_lon),
            });
        }
    }

    public addTravelEdges(records: TripSegmentRecord[]): void {
        for(const record of records){
            const weight = record.weight;
            if(!record.from_stop_id || !record.to_stop_id || weight === null || !Number.isFinite(weight) || weight < 0){
                this.statistics.malformedRecords++;
                continue;
            }
            if(!this.connectsStations(record.from_stop_id, record.to_stop_id)){
                this.statistics.danglingEdges++;
                continue;
            }
            this.setEdge({
                from: record.from_stop_id,
                to: record.to_stop_id,
                weight: weight,
                type: 'travel',
                route: record.route_id,
            });
        }
    }

    public addTransferEdges(records: TransferRecord[]): void {
        for(const record of records){
            if(!record.from_stop_id || !record.to_stop_id){
                this.statistics.malformedRecords++;
                continue;
            }
            if(record.from_stop_id === record.to_stop_id){
                this.statistics.selfLoops++;
                continue;
            }
            if(!this.connectsStations(record.from_stop_id, record.to_stop_id)){
                this.statistics.danglingEdges++;
                continue;
            }
            this.setEdge({
                from: record.from_stop_id,
                to: record.to_stop_id,
                weight: this.getTransferTime(record.min_transfer_time),
                type: 'transfer',
            });
        }
    }

    /**
     * Stores the edge for its ordered station pair. An existing edge of the pair is replaced completely,
     * including its type and route.
     * FIXME: a transfer discards the travel edge of the same pair even if the travel is faster. Keep until the
     * intended precedence of the two edge types is decided.
     * @param edge
     */
    public setEdge(edge: Edge): void {
        const key = Graph.edgeKey(edge.from, edge.to);
        if(this.edges.has(key)){
            this.statistics.overwrittenEdges++;
        }
        this.edges.set(key, edge);
    }

    public toGraph(): Graph {
        return new Graph(this.stations, this.edges, this.statistics);
    }

    private getTransferTime(minTransferTime: number | null): number {
        if(minTransferTime !== null && Number.isFinite(minTransferTime) && minTransferTime > 0){
            return minTransferTime;
        }
        return this.defaultTransferTime;
    }

    private connectsStations(from: string, to: string): boolean {
        return this.stations.has(from) && this.stations.has(to);
    }

    private toCoordinate(value: number | null): number | null {
        return value !== null && Number.isFinite(value) ? value : null;
    }
}
