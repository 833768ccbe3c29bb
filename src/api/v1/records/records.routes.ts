// src/api/v1/records/records.routes.ts
import { Router } from 'express';
import {
    handleAppendRecord,
    handleGetCatalog,
    handleGetPreset,
    handleRemoveRecord,
    handleSubmitBatch,
    handleVerifySerials,
} from './records.controller';

/**
 * Routes for composing batch files, mounted under /records.
 */
const createRecordsRouter = (): Router => {
    const router = Router();

    router.get('/catalog', handleGetCatalog);
    router.get('/presets/:failureCausedType', handleGetPreset);
    router.post('/verify', handleVerifySerials);
    router.post('/submit', handleSubmitBatch);
    router.post('/', handleAppendRecord);
    router.delete('/:productFID', handleRemoveRecord);

    return router;
};

export default createRecordsRouter;
