import { QueryRequest, SendResponse } from './types';
import { PlannerConfig } from '../../config';
import { Converter } from '../../data/converter';
import { Graph } from '../../data/graph';
import { createHaversineHeuristic, Heuristic } from '../../data/heuristic';
import { Planner } from '../../data/planner';
import { JourneyResponse } from '../../models/JourneyResponse';
import { RouteResult, SearchError, SearchResult } from '../../models/SearchResult';
import { Section } from '../../models/Section';

export class RoutePlanningController {
    constructor(private readonly graph: Graph, private readonly config: PlannerConfig,
        private readonly heuristic: Heuristic = createHaversineHeuristic(config)) {}

    /**
     * Plans the fastest route between origin and destination. Both can be given as station id or station name.
     * @param req
     * @param res
     * @returns
     */
    public planRoute(req: QueryRequest, res: SendResponse){
        try {
            // checks the parameters of the http request
            const originParameter = req.query.origin;
            const destinationParameter = req.query.destination;
            if(typeof originParameter !== 'string' || typeof destinationParameter !== 'string'){
                res.status(400).send();
                return;
            }
            const result = this.planFastestRoute(this.resolveStations(originParameter), this.resolveStations(destinationParameter));
            if(result.success){
                res.status(200).send(this.getJourneyResponse(result.route));
            } else {
                res.status(this.getErrorStatus(result.error)).send(result.error);
            }
        } catch (err) {
            res.status(500).send(err);
        }
    }

    /**
     * Maps a station name to the ids of all stations with this name. Unknown names are returned unchanged.
     * @param idOrName
     * @returns
     */
    private resolveStations(idOrName: string): string[] {
        if(this.graph.hasStation(idOrName)){
            return [idOrName];
        }
        const ids = this.graph.getStationIdsByName(idOrName);
        return ids.length > 0 ? ids : [idOrName];
    }

    /**
     * Plans a route for every pair of origin and destination candidates and keeps the fastest one.
     * Without any route the failure of the first pair is returned.
     * @param origins
     * @param destinations
     * @returns
     */
    private planFastestRoute(origins: string[], destinations: string[]): SearchResult {
        let best: SearchResult | undefined;
        for(const origin of origins){
            for(const destination of destinations){
                const result = Planner.planRoute(this.graph, origin, destination, this.config, this.heuristic);
                if(!result.success && result.error.type === 'SearchTimeout'){
                    return result;
                }
                if(best === undefined || this.isFaster(result, best)){
                    best = result;
                }
            }
        }
        if(best === undefined){
            throw new Error('no station candidates');
        }
        return best;
    }

    private isFaster(result: SearchResult, best: SearchResult): boolean {
        return result.success && (!best.success || result.route.totalSeconds < best.route.totalSeconds);
    }

    private getErrorStatus(error: SearchError): number {
        switch(error.type){
            case 'NodeNotFound':
            case 'NoPathFound':
                return 404;
            case 'SearchTimeout':
                return 504;
        }
    }

    /**
     * Generates the response which includes the station names and all sections of the route.
     * @param route
     * @returns
     */
    private getJourneyResponse(route: RouteResult): JourneyResponse {
        const sections: Section[] = route.sections.map(edge => {
            const section: Section = {
                departureStop: this.getStationName(edge.from),
                arrivalStop: this.getStationName(edge.to),
                duration: Converter.secondsToDuration(edge.weight),
                type: edge.type === 'travel' ? 'Train' : 'Transfer',
            }
            if(edge.route !== undefined){
                section.route = edge.route;
            }
            return section;
        });
        return {
            sourceStop: this.getStationName(route.path[0]),
            targetStop: this.getStationName(route.path[route.path.length - 1]),
            totalTime: Converter.secondsToDuration(route.totalSeconds),
            totalSeconds: route.totalSeconds,
            stops: route.path.length - 1,
            sections: sections,
        }
    }

    private getStationName(id: string): string {
        return this.graph.getStation(id)?.name ?? id;
    }
}
