// src/socket/handlers/connection.handlers.ts
import { Socket } from 'socket.io';
import { container } from 'tsyringe';
import { LoggingService } from '../../services/logging.service';
import { UploadTaskManagerService } from '../../services/uploadTaskManager.service';

/**
 * Sends a newly connected client the current task list as `upload:snapshot`.
 * Live updates reach it through the broadcasts set up in the socket loader.
 */
export const handleConnection = (socket: Socket): void => {
    const logger = container.resolve(LoggingService).getLogger('app', { service: 'SocketConnection', socketId: socket.id });
    logger.info({ event: 'socket_connected' }, 'Client connected.');

    socket.emit('upload:snapshot', { tasks: container.resolve(UploadTaskManagerService).listTasks() });

    socket.on('disconnect', (reason: string) => {
        logger.info({ event: 'socket_disconnected', reason }, 'Client disconnected.');
    });
    socket.on('error', (error: Error) => {
        logger.warn({ event: 'socket_error', errorMessage: error.message }, 'Socket error.');
    });
};
