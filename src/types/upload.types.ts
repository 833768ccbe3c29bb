// src/types/upload.types.ts

/** How a batch worker selects lines from its ledger. */
export type UploadMode = 'normal' | 'retry';

/** Failure taxonomy used for ledger status suffixes and task summaries. */
export type ErrorCategory =
    | 'FileError'
    | 'ConnectionFailure'
    | 'FormatError'
    | 'ProductNotFound'
    | 'SubmissionFailure'
    | 'Other';

export interface ClassifiedError {
    category: ErrorCategory;
    /** Text persisted after ` // ` in the ledger. */
    label: string;
}

/**
 * One line of a ledger file. `statusSuffix` is `"success"` or a failure label;
 * absent when the record has not been attempted yet.
 */
export interface LedgerLine {
    rawContent: string;
    statusSuffix?: string;
}

/**
 * Editable repair values sent to the legacy form. Field names follow the form's own names.
 */
export interface RepairData {
    failureCausedType: string;
    repairResult: string;
    remarks: string;
    componentLocation: string;
    repairComponentA5E: string;
    type: string;
    failureKind: string;
    fcode: string;
    repairAction: string;
    engineer: string;
}

/** A ledger line split into its positional fields. */
export interface RepairRecord {
    productFID: string;
    boardFIDs: string[];
    failureCausedTypeCode: string;
    repairData: RepairData;
}

export interface UploadResult {
    originalLine: string;
    success: boolean;
    errorCategory?: string;
    productFID: string;
}

export type WorkerOutcome = 'success' | 'partial' | 'failure';

export interface WorkerSummary {
    outcome: WorkerOutcome;
    /** True for `success` and `partial`. */
    success: boolean;
    message: string;
    results: UploadResult[];
    /** Ledger content as read when the worker started; used to merge a retry rewrite. */
    ledgerLines: LedgerLine[];
    successCount: number;
    failureCount: number;
    elapsedMs: number;
    mode: UploadMode;
}

export interface WorkerRecordEvent {
    productFID: string;
    success: boolean;
    reason?: string;
}

/** Typed event channel of a batch worker. */
export interface UploadWorkerEvents {
    progress: (percent: number) => void;
    status: (text: string) => void;
    record: (event: WorkerRecordEvent) => void;
    finished: (summary: WorkerSummary) => void;
}

export type UploadTaskStatus = 'running' | WorkerOutcome | 'cancelled';

/** Serializable view of a task, as returned by the API. */
export interface UploadTaskSnapshot {
    id: string;
    filePath: string;
    originalFilePath: string;
    mode: UploadMode;
    status: UploadTaskStatus;
    progress: number;
    lastStatusText: string;
    createdAt: string;
    finishedAt?: string;
    summary?: Omit<WorkerSummary, 'ledgerLines'>;
}

/** Events emitted by the task manager and forwarded to socket clients. */
export interface UploadTaskEvents {
    'task:progress': (payload: { taskId: string; percent: number }) => void;
    'task:status': (payload: { taskId: string; text: string }) => void;
    'task:record': (payload: { taskId: string } & WorkerRecordEvent) => void;
    'task:finished': (payload: { taskId: string; summary: Omit<WorkerSummary, 'ledgerLines'> }) => void;
    'task:file-renamed': (payload: { taskId: string; oldPath: string; newPath: string }) => void;
    'task:removed': (payload: { taskId: string }) => void;
}

// --- Record composition ---

export type FailureCausedTypeCode = '0' | '1' | '2' | '3' | '4';

/** Input of the record composer: one repair event typed in by an operator. */
export interface RepairDraft {
    productFID: string;
    boardFIDs: string[];
    failureCausedType: FailureCausedTypeCode;
    failureCausedTypeText?: string;
    repairResult: string;
    remarks: string;
    componentLocation: string;
    repairComponentA5E: string;
    type: string;
    failureKind: string;
    fcode?: string;
    repairAction: string;
    engineer: string;
}

export interface FailurePreset {
    type: string;
    failureKind: string;
    fcode: string;
    remarks: string;
    componentLocation: string;
    repairComponentA5E: string;
}

export interface FailureCatalog {
    failureKindsByCausedType: Record<FailureCausedTypeCode, string[]>;
    fcodeByFailureKind: Record<string, string>;
    defaultFcode: string;
    presets: Record<FailureCausedTypeCode, FailurePreset>;
}

export type SerialVerification = 'pass' | 'fail' | 'incomplete';

/**
 * Anything that can produce the SNR text of a board, e.g. a screen OCR helper.
 */
export interface TextSource {
    readText(): Promise<string>;
}
