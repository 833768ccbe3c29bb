// src/api/v1/upload/upload.routes.ts
import { Router } from 'express';
import {
    handleDeleteTaskRecord,
    handleGetTask,
    handleListTasks,
    handleRemoveTask,
    handleRetryTask,
    handleStartTask,
} from './upload.controller';

/**
 * Routes for upload tasks, mounted under /uploads.
 */
const createUploadRouter = (): Router => {
    const router = Router();

    router.post('/tasks', handleStartTask);
    router.get('/tasks', handleListTasks);
    router.get('/tasks/:taskId', handleGetTask);
    router.post('/tasks/:taskId/retry', handleRetryTask);
    router.delete('/tasks/:taskId', handleRemoveTask);
    router.delete('/tasks/:taskId/records/:productFID', handleDeleteTaskRecord);

    return router;
};

export default createUploadRouter;
