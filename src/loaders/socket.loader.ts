// src/loaders/socket.loader.ts
import { Server as HttpServer } from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { container } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { UploadTaskManagerService } from '../services/uploadTaskManager.service';
import { UploadTaskEvents } from '../types/upload.types';
import { handleConnection } from '../socket/handlers/connection.handlers';

/** Task manager event and the event name broadcast to every client for it. */
export const UPLOAD_EVENT_BRIDGE: ReadonlyArray<readonly [keyof UploadTaskEvents, string]> = [
    ['task:progress', 'upload:progress'],
    ['task:status', 'upload:status'],
    ['task:record', 'upload:record'],
    ['task:finished', 'upload:finished'],
    ['task:file-renamed', 'upload:file-renamed'],
    ['task:removed', 'upload:removed'],
];

/**
 * Forwards every task manager event to all connected clients. Returns a function that detaches the listeners.
 */
export const bridgeTaskEvents = (io: Pick<SocketIOServer, 'emit'>, taskManager: UploadTaskManagerService): (() => void) => {
    const detachers = UPLOAD_EVENT_BRIDGE.map(([eventName, socketEvent]) => {
        const listener = (payload: unknown) => {
            io.emit(socketEvent, payload);
        };
        taskManager.on(eventName, listener);
        return () => {
            taskManager.off(eventName, listener);
        };
    });
    return () => detachers.forEach(detach => detach());
};

/**
 * Attaches Socket.IO to the HTTP server and wires the upload task broadcasts.
 */
export const initSocketIO = (httpServer: HttpServer): SocketIOServer => {
    const configService = container.resolve(ConfigService);

    const io = new SocketIOServer(httpServer, {
        cors: {
            origin: configService.corsOrigin,
            methods: ["GET", "POST"],
            credentials: true
        },
    });

    bridgeTaskEvents(io, container.resolve(UploadTaskManagerService));

    io.on('connection', (socket: Socket) => {
        handleConnection(socket);
    });

    return io;
};
