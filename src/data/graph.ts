import { BuildStatistics } from '../models/BuildStatistics';
import { Edge } from '../models/Edge';
import { Station } from '../models/Station';

/**
 * Directed weighted graph of stations. Holds at most one edge per ordered station pair.
 * Immutable after construction, can be shared between searches.
 */
export class Graph {
    private readonly stations: ReadonlyMap<string, Station>;
    private readonly edges: ReadonlyMap<string, Edge>;
    // outgoing edges of each station in insertion order
    private readonly outgoingEdges: ReadonlyMap<string, readonly Edge[]>;
    public readonly statistics: Readonly<BuildStatistics>;

    constructor(stations: ReadonlyMap<string, Station>, edges: ReadonlyMap<string, Edge>, statistics: BuildStatistics) {
        const frozenStations = new Map<string, Station>();
        for(const [id, station] of stations){
            frozenStations.set(id, Object.freeze({ ...station }));
        }
        const frozenEdges = new Map<string, Edge>();
        const outgoingEdges = new Map<string, Edge[]>();
        for(const [key, edge] of edges){
            const frozenEdge = Object.freeze({ ...edge });
            frozenEdges.set(key, frozenEdge);
            const edgesOfStation = outgoingEdges.get(edge.from);
            if(edgesOfStation === undefined){
                outgoingEdges.set(edge.from, [frozenEdge]);
            } else {
                edgesOfStation.push(frozenEdge);
            }
        }
        this.stations = frozenStations;
        this.edges = frozenEdges;
        this.outgoingEdges = outgoingEdges;
        this.statistics = Object.freeze({ ...statistics });
    }

    /**
     * Key of the ordered station pair in the edge map.
     * @param from
     * @param to
     * @returns
     */
    public static edgeKey(from: string, to: string): string {
        return JSON.stringify([from, to]);
    }

    public get numberOfStations(): number {
        return this.stations.size;
    }

    public get numberOfEdges(): number {
        return this.edges.size;
    }

    public hasStation(id: string): boolean {
        return this.stations.has(id);
    }

    public getStation(id: string): Station | undefined {
        return this.stations.get(id);
    }

    public getStations(): Station[] {
        return Array.from(this.stations.values());
    }

    public getEdge(from: string, to: string): Edge | undefined {
        return this.edges.get(Graph.edgeKey(from, to));
    }

    public getEdges(): Edge[] {
        return Array.from(this.edges.values());
    }

    public getOutgoingEdges(id: string): readonly Edge[] {
        return this.outgoingEdges.get(id) ?? [];
    }

    /**
     * Gets the ids of all stations with the given name (case insensitive), e.g. a parent station and its platforms.
     * @param name
     * @returns
     */
    public getStationIdsByName(name: string): string[] {
        const searchName = name.toLowerCase();
        const ids: string[] = [];
        for(const station of this.stations.values()){
            if(station.name.toLowerCase() === searchName){
                ids.push(station.id);
            }
        }
        return ids;
    }

    /**
     * Returns up to limit distinct station names which contain the given string (case insensitive).
     * @param name
     * @param limit
     * @returns
     */
    public getMatchingStationNames(name: string, limit: number): string[] {
        const searchName = name.toLowerCase();
        const matchingNames: string[] = [];
        for(const station of this.stations.values()){
            if(matchingNames.length >= limit){
                break;
            }
            if(station.name.toLowerCase().includes(searchName) && !matchingNames.includes(station.name)){
                matchingNames.push(station.name);
            }
        }
        return matchingNames;
    }
}
