// src/api/v1/dashboard/dashboard.routes.ts
import { Router } from 'express';
import {
    getCountryDetail,
    getMapPoints,
    getObservations,
    getSummary,
    getTopCountries,
} from './dashboard.controller';

const createDashboardRouter = (): Router => {
    const router = Router();

    router.get('/summary', getSummary);
    router.get('/top', getTopCountries);
    router.get('/countries/:name', getCountryDetail);
    router.get('/map-points', getMapPoints);
    router.get('/observations', getObservations);

    return router;
};

export default createDashboardRouter;
