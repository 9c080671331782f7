import express from 'express';
import { RoutePlanningController } from '../controller/routePlanningController';

export function createRoutePlanningRouter(controller: RoutePlanningController): express.Router {
    const router = express.Router();
    router.get('/plan', (req, res) => {
        controller.planRoute(req, res);
    });
    return router;
}
