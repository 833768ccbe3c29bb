// src/loaders/index.ts
import { Express } from 'express';
import { Server as HttpServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';

import { loadExpress } from './express.loader';
import { initSocketIO } from './socket.loader';

/**
 * The initialized Express app, HTTP server and Socket.IO server.
 */
interface LoadersResult {
    app: Express;
    httpServer: HttpServer;
    io: SocketIOServer;
}

/**
 * Initializes the Express application and attaches Socket.IO to its HTTP server.
 * Services are resolved lazily from the container registered in `src/container.ts`.
 */
export const initLoaders = async (): Promise<LoadersResult> => {
    const app = loadExpress();
    const httpServer = new HttpServer(app);
    const io = initSocketIO(httpServer);

    return { app, httpServer, io };
};
