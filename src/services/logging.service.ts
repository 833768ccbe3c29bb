// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, LevelWithSilent, stdTimeFunctions, Level, StreamEntry, DestinationStream } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; taskId?: string;[key: string]: unknown };
/** Shared loggers; task loggers come from `getTaskLogger`. */
export type LoggerType = 'app';

interface TaskLoggerEntry {
    logger: Logger;
    stream: DestinationStream & { end?: () => void; once?: (event: string, listener: (...args: unknown[]) => void) => void };
    filePath: string;
}

@singleton()
export class LoggingService {
    private appLoggerInternal?: Logger;
    private taskLoggers: Map<string, TaskLoggerEntry> = new Map();

    private readonly logLevel: LevelWithSilent;
    private readonly appLoggerForInternalOps: Logger;

    private isShuttingDown = false;
    private isInitialized = false;

    constructor(@inject(ConfigService) private configService: ConfigService) {
        this.logLevel = this.configService.logLevel;
        this.appLoggerForInternalOps = pino({ name: 'LoggingServiceInternal', level: this.logLevel });
    }

    public async initialize(): Promise<void> {
        if (this.isInitialized) {
            this.appLoggerForInternalOps.warn('Loggers already initialized.');
            return;
        }

        this.ensureDirectory(this.configService.logsDirectory, 'Main Logs Directory');
        this.ensureDirectory(this.configService.appConfiguration.appLogDirectory, 'App Log Directory');
        this.ensureDirectory(this.configService.taskLogDirectory, 'Task Logs Directory');

        try {
            this.appLoggerInternal = this.createAppLogger(this.configService.appLogFilePathForWriting);
            this.isInitialized = true;
            this.appLoggerInternal.info({ service: 'LoggingService' }, 'Shared loggers initialized.');
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            console.error(`[LoggingService:Initialize] CRITICAL: Failed to initialize shared loggers: ${message}. Stack: ${stack}.`);
            throw error;
        }
    }

    private ensureDirectory(dirPath: string, logTypeDesc: string): void {
        try {
            if (!fs.existsSync(dirPath)) {
                fs.mkdirSync(dirPath, { recursive: true });
            }
            fs.accessSync(dirPath, fs.constants.W_OK);
        } catch (err: unknown) {
            const { message: errorMessage } = getErrorMessageAndStack(err);
            const errorMsg = `CRITICAL: Error ensuring ${logTypeDesc} directory "${dirPath}" exists or is writable: "${errorMessage}". Logging to this path may fail.`;
            console.error(`[LoggingService:EnsureDir] ${errorMsg}`);
            throw new Error(errorMsg);
        }
    }

    private baseOptions(base?: Record<string, unknown>): LoggerOptions {
        return {
            level: this.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: base ?? undefined, // Không tự động thêm pid, hostname
        };
    }

    private consoleStreams(): StreamEntry[] {
        if (!this.configService.logToConsole || this.logLevel === 'silent') {
            return [];
        }
        if (this.configService.isProduction) {
            return [{ level: this.logLevel as Level, stream: process.stdout }];
        }
        return [{
            level: this.logLevel as Level,
            stream: pretty({ colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' }),
        }];
    }

    private createAppLogger(logFilePath: string): Logger {
        const streams: StreamEntry[] = this.consoleStreams();
        if (this.logLevel !== 'silent') {
            try {
                const fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
                streams.push({ level: this.logLevel as Level, stream: fileStream });
            } catch (err) {
                const { message: errMsg } = getErrorMessageAndStack(err);
                console.error(`[LoggingService:CreateAppLogger] CRITICAL: Failed to create file stream at "${logFilePath}". Error: "${errMsg}".`);
            }
        }

        if (streams.length > 0) {
            return pino(this.baseOptions(), pino.multistream(streams));
        }
        return pino({ ...this.baseOptions(), name: 'appEmergencyFallback' });
    }

    /**
     * Returns the logger dedicated to one upload task, creating its log file on first use.
     * Every entry carries the task id.
     */
    public getTaskLogger(taskId: string, baseContext?: LoggerContext): Logger {
        const existing = this.taskLoggers.get(taskId);
        if (existing) {
            return baseContext ? existing.logger.child(baseContext) : existing.logger;
        }

        if (!this.isInitialized || this.logLevel === 'silent') {
            // Chưa init (tests, CLI scripts): không tạo file, chỉ log theo level cấu hình
            const fallback = pino({ ...this.baseOptions({ taskId }), name: `task-${taskId}` });
            return baseContext ? fallback.child(baseContext) : fallback;
        }

        const logFilePath = this.configService.getTaskLogFilePath(taskId);
        let fileStream: DestinationStream;
        try {
            this.ensureDirectory(path.dirname(logFilePath), `task log directory for ${taskId}`);
            fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
        } catch (fileStreamError) {
            this.appLoggerForInternalOps.error({
                taskId,
                logFilePath,
                err: getErrorMessageAndStack(fileStreamError),
                event: 'task_logger_file_stream_failed',
            }, 'Task-specific file logging disabled for this task.');
            const emergencyLogger = pino({ ...this.baseOptions({ taskId }), name: `Emergency-task-${taskId}-NoFile` });
            return baseContext ? emergencyLogger.child(baseContext) : emergencyLogger;
        }

        const streams: StreamEntry[] = [...this.consoleStreams(), { level: this.logLevel as Level, stream: fileStream }];
        const newLogger = pino(this.baseOptions({ taskId }), pino.multistream(streams));

        this.taskLoggers.set(taskId, { logger: newLogger, stream: fileStream, filePath: logFilePath });
        newLogger.info({ event: 'task_logger_created', logFilePath }, 'Logger initialized for this task.');

        return baseContext ? newLogger.child(baseContext) : newLogger;
    }

    public async closeTaskLogger(taskId: string): Promise<void> {
        const entry = this.taskLoggers.get(taskId);
        if (!entry) {
            return;
        }
        const { logger, stream, filePath } = entry;
        logger.info({ event: 'task_logger_closing', logFilePath: filePath }, `Closing task logger ${taskId}.`);
        this.taskLoggers.delete(taskId);

        const endable = stream.end;
        const once = stream.once;
        if (typeof endable !== 'function' || typeof once !== 'function') {
            return;
        }

        await new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                this.appLoggerForInternalOps.warn({ event: 'task_logger_close_timeout', taskId, filePath }, `Timeout waiting for task logger stream to close. Assuming closed.`);
                resolve();
            }, 3000);
            once.call(stream, 'close', () => {
                clearTimeout(timer);
                resolve();
            });
            endable.call(stream);
        });
    }

    public async flushLogsAndClose(): Promise<void> {
        if (this.isShuttingDown) {
            return;
        }
        this.isShuttingDown = true;
        const taskIds = Array.from(this.taskLoggers.keys());
        const results = await Promise.allSettled(taskIds.map(taskId => this.closeTaskLogger(taskId)));
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                this.appLoggerForInternalOps.error({
                    event: 'task_logger_close_on_shutdown_error',
                    taskId: taskIds[index],
                    error: getErrorMessageAndStack(result.reason).message,
                }, 'A task logger failed to close during shutdown.');
            }
        });
        this.appLoggerInternal?.flush();
        this.isInitialized = false;
    }

    public getLogger(_type: LoggerType = 'app', context?: LoggerContext): Logger {
        const target = this.appLogger;
        return context ? target.child(context) : target;
    }

    public get appLogger(): Logger {
        if (!this.appLoggerInternal || this.isShuttingDown) {
            // Logger tạm trước khi initialize() hoặc sau khi shutdown
            this.appLoggerInternal = this.appLoggerInternal ?? pino({ ...this.baseOptions(), name: 'PreInitAppLogger' });
        }
        return this.appLoggerInternal;
    }
}
