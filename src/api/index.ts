// src/api/index.ts
import { Router } from 'express';
import createV1Router from './v1';

/**
 * Top-level API router. Each API version is mounted under its own prefix.
 */
const createApiRouter = (): Router => {
    const router = Router();
    router.use('/v1', createV1Router());
    return router;
};

export default createApiRouter;
