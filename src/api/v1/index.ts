// src/api/v1/index.ts
import { Router } from 'express';
import createDashboardRouter from './dashboard/dashboard.routes';

/**
 * Aggregates the v1 feature routers under `/api/v1`.
 */
const createV1Router = (): Router => {
    const router = Router();
    router.use('/dashboard', createDashboardRouter());
    return router;
};

export default createV1Router;
