import { Router } from 'express';
import { PlannerConfig } from '../../config';
import { Graph } from '../../data/graph';
import { RoutePlanningController } from '../controller/routePlanningController';
import { StopController } from '../controller/stopController';
import { createRoutePlanningRouter } from './route-planning-routes';
import { createStopRouter } from './stop-routes';

export function createRoutes(graph: Graph, config: PlannerConfig): Router {
    const routes = Router();

    routes.use('/stops', createStopRouter(new StopController(graph)));
    routes.use('/routes', createRoutePlanningRouter(new RoutePlanningController(graph, config)));

    return routes;
}
