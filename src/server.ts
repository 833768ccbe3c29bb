import 'reflect-metadata'; // QUAN TRỌNG: Phải là import đầu tiên
import './container'; // Khởi tạo IoC container
import { container } from 'tsyringe';
import http from 'http';
import { Logger } from 'pino';
import { Server as SocketIOServer } from 'socket.io';
import { initLoaders } from './loaders';
import { LoggingService } from './services/logging.service';
import { ConfigService } from './config/config.service';
import { UploadTaskManagerService } from './services/uploadTaskManager.service';
import { getErrorMessageAndStack } from './utils/errorUtils';

const SHUTDOWN_TIMEOUT_MS = 15000;

/**
 * Logger toàn cục của ứng dụng, có sau khi LoggingService được khởi tạo.
 */
let logger: Logger | undefined;
let loggingService: LoggingService | undefined;
let httpServer: http.Server | undefined;
let io: SocketIOServer | undefined;

/**
 * Cờ để ngăn chặn việc gọi shutdown nhiều lần.
 */
let isShuttingDown = false;

async function startServer(): Promise<void> {
    try {
        // --- 1. Config và Logging phải đi trước ---
        const configService = container.resolve(ConfigService);
        loggingService = container.resolve(LoggingService);

        try {
            await loggingService.initialize();
            logger = loggingService.getLogger('app', { service: 'Server' });
        } catch (error) {
            console.error("FATAL: Could not initialize logging service. Exiting.", error);
            process.exit(1);
        }

        // --- 2. Express + Socket.IO ---
        const loaderResult = await initLoaders();
        httpServer = loaderResult.httpServer;
        io = loaderResult.io;

        // --- 3. Lắng nghe ---
        const port = configService.port;
        httpServer.listen(port, () => {
            logger?.info({
                event: 'server_listening',
                port,
                corsAllowedOrigins: configService.corsAllowedOrigins,
                recordDirectory: configService.recordDirectory,
            }, `🚀 Server ready at http://localhost:${port}`);
        });
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        if (logger) {
            logger.fatal({ event: 'server_start_failed', err: { message, stack } }, 'Application failed to start.');
        } else {
            console.error(`[Server Start] Application failed to start: ${message}`, stack);
        }
        await gracefulShutdown('Initialization Error', error);
    }
}

/**
 * Stops accepting requests, cancels running upload tasks, flushes logs and exits.
 * @param signal - What triggered the shutdown (e.g. 'SIGINT', 'uncaughtException').
 * @param error - The error behind it, if any; the exit code is then 1.
 */
async function gracefulShutdown(signal: string, error?: unknown): Promise<void> {
    const reason = error ? `error (${getErrorMessageAndStack(error).message})` : `signal (${signal})`;

    if (isShuttingDown) {
        logger?.warn({ event: 'shutdown_already_running', signal }, `Shutdown already in progress, ignoring ${reason}.`);
        return;
    }
    isShuttingDown = true;

    let exitCode = error ? 1 : 0;
    logger?.info({ event: 'shutdown_started', signal }, `Received ${reason}. Shutting down...`);

    const shutdownTimeout = setTimeout(() => {
        logger?.error({ event: 'shutdown_timeout', timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Graceful shutdown timed out. Forcing exit.');
        process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
        // --- Bước 1: Ngừng nhận kết nối mới ---
        if (io) {
            await new Promise<void>(resolve => {
                io?.close(() => resolve());
            });
            logger?.info({ event: 'socket_server_closed' });
        } else if (httpServer?.listening) {
            const server = httpServer;
            await new Promise<void>(resolve => {
                server.close((closeError) => {
                    if (closeError) {
                        logger?.error({ event: 'http_server_close_failed', err: getErrorMessageAndStack(closeError) });
                    }
                    resolve();
                });
            });
        }

        // --- Bước 2: Dừng các upload task đang chạy ---
        await container.resolve(UploadTaskManagerService).shutdown();
    } catch (cleanupError: unknown) {
        logger?.error({ event: 'shutdown_cleanup_failed', err: getErrorMessageAndStack(cleanupError) }, 'Unexpected error during cleanup.');
        exitCode = 1;
    } finally {
        // --- Bước cuối: Flush logs và thoát ---
        if (loggingService) {
            await loggingService.flushLogsAndClose();
        }
        clearTimeout(shutdownTimeout);
        console.log(`[Shutdown] Completed. Exiting with code ${exitCode}.`);
        process.exit(exitCode);
    }
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

shutdownSignals.forEach((signal) => {
    process.on(signal, () => {
        void gracefulShutdown(signal);
    });
});

process.on('uncaughtException', (err: Error, origin: string) => {
    logger?.fatal({ err: { message: err.message, stack: err.stack, name: err.name }, origin }, 'Uncaught exception. Starting emergency shutdown.');
    if (!isShuttingDown) {
        void gracefulShutdown('uncaughtException', err);
    } else {
        process.exit(1);
    }
});

process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason ?? 'Unknown unhandled rejection reason'));
    logger?.fatal({ err: { message: error.message, stack: error.stack, name: error.name } }, 'Unhandled promise rejection. Starting emergency shutdown.');
    if (!isShuttingDown) {
        void gracefulShutdown('unhandledRejection', error);
    } else {
        process.exit(1);
    }
});

void startServer();
