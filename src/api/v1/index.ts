// src/api/v1/index.ts
import { Router } from 'express';
import createUploadRouter from './upload/upload.routes';
import createRecordsRouter from './records/records.routes';

/**
 * Creates and configures the main API router for version 1 (v1) of the API.
 * This router aggregates all feature-specific routers under the /api/v1 path.
 *
 * @returns {Router} An Express Router instance combining all v1 API feature routes.
 */
const createV1Router = (): Router => {
    const router = Router();
    router.use('/uploads', createUploadRouter());
    router.use('/records', createRecordsRouter());
    return router;
};
export default createV1Router;
