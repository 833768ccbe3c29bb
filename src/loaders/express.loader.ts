// src/loaders/express.loader.ts
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { container } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { requestLoggerMiddleware } from '../socket/middleware/requestLogger.middleware';
import apiRouter from '../api';
import { errorHandlerMiddleware, notFoundHandler } from '../socket/middleware/errorHandler.middleware';

/**
 * Builds the Express application: CORS, JSON bodies, request logging, the /api routes
 * and the 404 and error handlers.
 */
export const loadExpress = (): Express => {
    const configService = container.resolve(ConfigService);

    const app = express();

    app.use(cors({
        origin: configService.corsOrigin,
        methods: ["GET", "POST", "DELETE", "OPTIONS"],
        credentials: true,
        optionsSuccessStatus: 200
    }));

    app.use(express.json({ limit: '1mb' }));

    app.use(requestLoggerMiddleware);

    // Health check
    app.get('/', (req: Request, res: Response) => {
        res.status(200).send('Repair Record Uploader is running');
    });

    app.use('/api', apiRouter());

    app.use(notFoundHandler);
    app.use(errorHandlerMiddleware);
    return app;
};
