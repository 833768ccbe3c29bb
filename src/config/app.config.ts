import { singleton } from 'tsyringe';
import path from 'path';
import { AppConfig } from './types';
import { LevelWithSilent } from 'pino';

@singleton()
export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly port: number;
    public readonly corsAllowedOrigins: string[];

    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly taskLogSubdir: string = 'by_task';
    public readonly logToConsole: boolean;

    // Thư mục lưu các file batch mới; fallback sang user profile khi không dùng được
    public readonly recordDirectoryPath: string;
    public readonly ledgerLegacyEncoding: string;

    public readonly taskStopWaitMs: number;

    constructor(private appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.port = appConfig.PORT;
        this.corsAllowedOrigins = appConfig.CORS_ALLOWED_ORIGINS;

        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME || 'app.log';
        this.logToConsole = appConfig.LOG_TO_CONSOLE;

        this.recordDirectoryPath = path.resolve(appConfig.RECORD_DIRECTORY);
        this.ledgerLegacyEncoding = appConfig.LEDGER_LEGACY_ENCODING;

        this.taskStopWaitMs = appConfig.TASK_STOP_WAIT_MS;
    }

    get appLogDirectory(): string {
        return path.join(this.logsDirectoryPath, 'app');
    }

    get appLogFilePathForWriting(): string {
        return path.join(this.appLogDirectory, this.appLogFileName);
    }

    get taskLogDirectory(): string {
        return path.join(this.logsDirectoryPath, this.taskLogSubdir);
    }

    public getTaskLogFilePath(taskId: string): string {
        const safeTaskId = taskId.replace(/[^a-z0-9_.-]/gi, '_'); // Sanitize ID
        return path.join(this.taskLogDirectory, `${safeTaskId}.log`);
    }
}
