// src/types/legacySystem.types.ts
import { RepairData } from './upload.types';

/** Identifiers the legacy search endpoint returns for one serial number. */
export interface SearchHit {
    requestID: string;
    uRequestID: string;
}

/** Values scraped from the edit page. Checkbox fields are booleans, the rest strings. */
export type ExtractedFormFields = Record<string, string | boolean>;

/** Form-encoded submission payload. */
export type SubmissionForm = Record<string, string>;

export interface AuthenticationResult {
    ok: boolean;
    message: string;
}

export interface ProcessRecordOutcome {
    success: boolean;
    error?: string;
}

/**
 * The part of the session client a batch worker drives.
 */
export interface RecordUploader {
    authenticate(): Promise<AuthenticationResult>;
    processRecord(productFID: string, repairData: RepairData): Promise<ProcessRecordOutcome>;
}

// --- Domain errors ---

/**
 * Base for errors that map onto an HTTP status in the API layer.
 */
export class UploadServiceError extends Error {
    /** HTTP status the error handler answers with. */
    status: number;
    isOperational = true;

    constructor(message: string, status: number) {
        super(message);
        this.name = 'UploadServiceError';
        this.status = status;
        Object.setPrototypeOf(this, UploadServiceError.prototype);
    }
}

export class LegacyConnectionError extends UploadServiceError {
    constructor(message: string) {
        super(message, 502);
        this.name = 'LegacyConnectionError';
        Object.setPrototypeOf(this, LegacyConnectionError.prototype);
    }
}

export class TaskNotFoundError extends UploadServiceError {
    constructor(taskId: string) {
        super(`Task ${taskId} not found.`, 404);
        this.name = 'TaskNotFoundError';
        Object.setPrototypeOf(this, TaskNotFoundError.prototype);
    }
}

export class RetryFileNotFoundError extends UploadServiceError {
    /** Paths that were tried, in order. */
    candidates: string[];

    constructor(taskId: string, candidates: string[]) {
        super(`No ledger file left to retry for task ${taskId}.`, 404);
        this.name = 'RetryFileNotFoundError';
        this.candidates = candidates;
        Object.setPrototypeOf(this, RetryFileNotFoundError.prototype);
    }
}

export class TaskBusyError extends UploadServiceError {
    constructor(taskId: string) {
        super(`Task ${taskId} is still running.`, 409);
        this.name = 'TaskBusyError';
        Object.setPrototypeOf(this, TaskBusyError.prototype);
    }
}

export class LedgerWriteError extends UploadServiceError {
    constructor(filePath: string, detail: string) {
        super(`Could not write ledger ${filePath}: ${detail}`, 500);
        this.name = 'LedgerWriteError';
        Object.setPrototypeOf(this, LedgerWriteError.prototype);
    }
}

export class BatchFileNotFoundError extends UploadServiceError {
    constructor(filePath: string) {
        super(`Batch file ${filePath} does not exist.`, 404);
        this.name = 'BatchFileNotFoundError';
        Object.setPrototypeOf(this, BatchFileNotFoundError.prototype);
    }
}

export class RecordNotFoundError extends UploadServiceError {
    constructor(productFID: string, filePath: string) {
        super(`No record for ${productFID} in ${filePath}.`, 404);
        this.name = 'RecordNotFoundError';
        Object.setPrototypeOf(this, RecordNotFoundError.prototype);
    }
}

/** Request body or params rejected by schema validation. */
export class RequestValidationError extends UploadServiceError {
    issues: string[];

    constructor(issues: string[]) {
        super(`Invalid request: ${issues.join('; ')}`, 400);
        this.name = 'RequestValidationError';
        this.issues = issues;
        Object.setPrototypeOf(this, RequestValidationError.prototype);
    }
}
