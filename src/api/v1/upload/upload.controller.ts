// src/api/v1/upload/upload.controller.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'pino';
import { z } from 'zod';

import { LoggingService } from '../../../services/logging.service';
import { UploadTaskManagerService } from '../../../services/uploadTaskManager.service';
import { RecordNotFoundError } from '../../../types/legacySystem.types';
import { parseRequest } from '../validation';

export const startTaskSchema = z.object({
    filePath: z.string().trim().min(1, 'filePath is required'),
    retryMode: z.boolean().optional().default(false),
});

const taskParamsSchema = z.object({
    taskId: z.string().min(1),
});

const recordParamsSchema = taskParamsSchema.extend({
    productFID: z.string().trim().min(1),
});

const getControllerLogger = (res: Response, routeName: string): Logger => {
    const loggingService = container.resolve(LoggingService);
    return loggingService.getLogger('app', {
        controller: 'UploadController',
        route: routeName,
        requestId: typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined,
    });
};

/** POST /uploads/tasks */
export const handleStartTask = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(res, 'handleStartTask');
    try {
        const { filePath, retryMode } = parseRequest(startTaskSchema, req.body);
        const taskId = await container.resolve(UploadTaskManagerService).startTask(filePath, retryMode);
        logger.info({ event: 'upload_task_accepted', taskId, filePath, retryMode }, 'Upload task accepted.');
        res.status(202).json({ taskId });
    } catch (error: unknown) {
        next(error);
    }
};

/** GET /uploads/tasks */
export const handleListTasks = (req: Request, res: Response): void => {
    res.status(200).json({ tasks: container.resolve(UploadTaskManagerService).listTasks() });
};

/** GET /uploads/tasks/:taskId */
export const handleGetTask = (req: Request, res: Response, next: NextFunction): void => {
    try {
        const { taskId } = parseRequest(taskParamsSchema, req.params);
        res.status(200).json(container.resolve(UploadTaskManagerService).getTask(taskId));
    } catch (error: unknown) {
        next(error);
    }
};

/** POST /uploads/tasks/:taskId/retry */
export const handleRetryTask = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(res, 'handleRetryTask');
    try {
        const { taskId } = parseRequest(taskParamsSchema, req.params);
        const newTaskId = await container.resolve(UploadTaskManagerService).retry(taskId);
        logger.info({ event: 'upload_retry_accepted', taskId, newTaskId });
        res.status(202).json({ taskId: newTaskId, replacedTaskId: taskId });
    } catch (error: unknown) {
        next(error);
    }
};

/** DELETE /uploads/tasks/:taskId */
export const handleRemoveTask = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
        const { taskId } = parseRequest(taskParamsSchema, req.params);
        await container.resolve(UploadTaskManagerService).removeTask(taskId);
        res.status(204).end();
    } catch (error: unknown) {
        next(error);
    }
};

/** DELETE /uploads/tasks/:taskId/records/:productFID */
export const handleDeleteTaskRecord = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(res, 'handleDeleteTaskRecord');
    try {
        const { taskId, productFID } = parseRequest(recordParamsSchema, req.params);
        const manager = container.resolve(UploadTaskManagerService);
        const removedCount = await manager.deleteRecord(taskId, productFID);
        if (removedCount === 0) {
            throw new RecordNotFoundError(productFID, manager.getTask(taskId).filePath);
        }
        logger.info({ event: 'task_record_deleted', taskId, productFID, removedCount });
        res.status(200).json({ productFID, removedCount });
    } catch (error: unknown) {
        next(error);
    }
};
