// src/config/schemas.ts
import { z } from 'zod';
import { LevelWithSilent } from 'pino';
import iconv from 'iconv-lite';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a comma-separated string from an environment variable into an array of trimmed strings.
 * @param {string} key - The environment variable key (for logging/error messages).
 */
export const parseCommaSeparatedString = (key: string): (val: string | undefined) => string[] => (val: string | undefined): string[] => {
    if (!val) {
        console.warn(`[ConfigService] WARN: Environment variable '${key}' is not set or empty. Returning empty array.`);
        return [];
    }
    return val.split(',').map(item => item.trim()).filter(item => item !== '');
};

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- General Server Configuration ---
    /**
     * Port on which the HTTP/Socket.IO server listens.
     * @default 3001
     */
    PORT: z.coerce.number().int().positive().default(3001),
    /**
     * Comma-separated list of allowed origins for CORS.
     * If not set, defaults to `['*']` in `ConfigService` constructor.
     */
    CORS_ALLOWED_ORIGINS: z.string().optional().transform(parseCommaSeparatedString('CORS_ALLOWED_ORIGINS')),

    // --- Logging Configuration ---
    /**
     * Minimum log level for the application.
     * @default 'info'
     */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as [LevelWithSilent, ...LevelWithSilent[]]).default('info'),
    /**
     * Directory where log files are stored. Task logs go to a `by_task` subdirectory.
     * @default './logs'
     */
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('app.log'),
    LOG_TO_CONSOLE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),

    // --- Record Ledger Storage ---
    /**
     * Directory where new batch files are created. Falls back to the user profile when it cannot be used.
     * @default './records'
     */
    RECORD_DIRECTORY: z.string().default('./records'),
    /**
     * Encoding tried when a UTF-8 ledger write fails, before falling back to the temp directory.
     * Any name iconv-lite knows.
     * @default 'gbk'
     */
    LEDGER_LEGACY_ENCODING: z.string().trim().default('gbk')
        .refine(iconv.encodingExists, { message: 'LEDGER_LEGACY_ENCODING must be an encoding supported by iconv-lite' }),

    // --- Legacy Repair System ---
    /**
     * Root URL of the legacy application, without a trailing slash.
     */
    LEGACY_BASE_URL: z.string().url("LEGACY_BASE_URL must be an absolute URL"),
    LEGACY_LOGIN_NAME: z.string().min(1, "LEGACY_LOGIN_NAME is required"),
    LEGACY_LOGIN_PASSWORD: z.string().min(1, "LEGACY_LOGIN_PASSWORD is required"),

    // --- Task Management ---
    /**
     * How long a cancelled worker is awaited before it is abandoned (ms).
     * @default 3000
     */
    TASK_STOP_WAIT_MS: z.coerce.number().int().nonnegative().default(3000),
});
