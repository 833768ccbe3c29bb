// src/api/index.ts
import { Router } from 'express';

import createV1Router from './v1';

/**
 * Creates the top-level API router. Every API version is mounted here (e.g. /api/v1).
 */
const createApiRouter = (): Router => {
    const router = Router();

    router.use('/v1', createV1Router());

    return router;
};

export default createApiRouter;
