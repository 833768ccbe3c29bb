// src/config/config.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import dotenv from 'dotenv';
import { z } from 'zod';

import { envSchema } from './schemas';
import { AppConfig, LegacySystemConfigStruct } from './types';
import { AppConfiguration } from './app.config';
import { LegacySystemConfig } from './legacySystem.config';

@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;

    private legacySystemConfiguration: LegacySystemConfig;
    public appConfiguration: AppConfiguration;

    constructor() {
        dotenv.config();

        try {
            this.rawConfig = envSchema.parse(process.env);

            if (this.rawConfig.CORS_ALLOWED_ORIGINS.length === 0) {
                this.rawConfig.CORS_ALLOWED_ORIGINS = ['*'];
            }

            this.appConfiguration = new AppConfiguration(this.rawConfig);
            this.legacySystemConfiguration = new LegacySystemConfig(this.rawConfig);

            if (this.nodeEnv !== 'test') {
                console.log("✅ Configuration loaded and validated successfully.");
                console.log(`   - NODE_ENV: ${this.nodeEnv}`);
                console.log(`   - Server Port: ${this.port}`);
                console.log(`   - Log Level: ${this.logLevel}`);
                console.log(`   - Logs Directory: ${this.logsDirectory}`);
                console.log(`   - Record Directory: ${this.recordDirectory}`);
                console.log(`   - Legacy Ledger Encoding: ${this.ledgerLegacyEncoding}`);
                console.log(`   - Legacy System: ${this.legacySystemConfiguration.baseUrl} (login: ${this.rawConfig.LEGACY_LOGIN_NAME ? 'Set' : 'Not Set'})`);
                console.log(`   - Task Stop Wait (ms): ${this.taskStopWaitMs}`);
            }
        } catch (error) {
            if (error instanceof z.ZodError) {
                console.error("❌ Invalid environment variables (schema validation failed):", JSON.stringify(error.format(), null, 2));
            } else {
                console.error("❌ Unexpected error loading configuration:", error);
            }
            process.exit(1);
        }
    }

    // --- Delegated Getters and Properties from AppConfiguration ---
    get nodeEnv() { return this.appConfiguration.nodeEnv; }

    /**
     * Checks if the current environment is 'production'.
     */
    public get isProduction(): boolean {
        return this.appConfiguration.nodeEnv === 'production';
    }

    get port() { return this.appConfiguration.port; }
    get corsAllowedOrigins() { return this.appConfiguration.corsAllowedOrigins; }
    /** `origin` option for the cors middleware and Socket.IO; a listed `*` allows every origin. */
    get corsOrigin(): string | string[] {
        return this.corsAllowedOrigins.includes('*') ? '*' : this.corsAllowedOrigins;
    }
    get logLevel() { return this.appConfiguration.logLevel; }

    // Log paths
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePathForWriting(): string { return this.appConfiguration.appLogFilePathForWriting; }
    get taskLogDirectory(): string { return this.appConfiguration.taskLogDirectory; }
    public getTaskLogFilePath(taskId: string): string {
        return this.appConfiguration.getTaskLogFilePath(taskId);
    }
    get logToConsole() { return this.appConfiguration.logToConsole; }

    // Ledger storage
    get recordDirectory(): string { return this.appConfiguration.recordDirectoryPath; }
    get ledgerLegacyEncoding(): string { return this.appConfiguration.ledgerLegacyEncoding; }

    get taskStopWaitMs(): number { return this.appConfiguration.taskStopWaitMs; }

    // --- Delegated Getters from LegacySystemConfig ---
    get legacySystemConfig(): LegacySystemConfigStruct { return this.legacySystemConfiguration.config; }
}
