import { QueryRequest, SendResponse } from './types';
import { Graph } from '../../data/graph';

export class StopController {
    constructor(private readonly graph: Graph) {}

    /**
     * Returns a number of station names which match a given string.
     * @param req
     * @param res
     */
    public getMatchingStops(req: QueryRequest, res: SendResponse){
        try {
            const name = req.query.name;
            const limit = Number(req.query.limit);
            if(typeof name === 'string' && Number.isInteger(limit) && limit >= 0){
                res.send(this.graph.getMatchingStationNames(name, limit));
            }
            else{
                res.status(400).send();
            }
        }
        catch (err) {
            res.status(500).send(err);
        }
    }

    /**
     * Returns if a station matches the given name.
     * @param req
     * @param res
     */
    public isValidStop(req: QueryRequest, res: SendResponse){
        try {
            const name = req.query.name;
            if(typeof name === 'string'){
                const isValidStop = this.graph.getStationIdsByName(name).length > 0;
                res.status(200).send(isValidStop);
            }
            else{
                res.status(400).send();
            }
        }
        catch (err) {
            res.status(500).send(err);
        }
    }
}
