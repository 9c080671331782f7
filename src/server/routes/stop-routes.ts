import express from 'express';
import { StopController } from '../controller/stopController';

export function createStopRouter(controller: StopController): express.Router {
    const router = express.Router();

    router.get('/matchingNames', (req, res) => {
        controller.getMatchingStops(req, res);
    });

    router.get('/isValidStop', (req, res) => {
        controller.isValidStop(req, res);
    });

    return router;
}
