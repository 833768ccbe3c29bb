// src/services/recordComposer.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from 'pino';
import { format } from 'date-fns';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LedgerFileService } from './ledgerFile.service';
import { UploadTaskManagerService } from './uploadTaskManager.service';
import {
    FailureCausedTypeCode,
    FailurePreset,
    RepairDraft,
    SerialVerification,
    TextSource,
} from '../types/upload.types';
import { BatchFileNotFoundError } from '../types/legacySystem.types';
import { failureCatalog, failureKindsFor, presetFor } from '../utils/upload/failureCatalog';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const BATCH_FILE_PREFIX = 'repair_batch_';
const BATCH_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss_SSS';

/** Starts upload tasks; the task manager in production. */
export interface BatchSubmitter {
    startTask(filePath: string, retryMode?: boolean): Promise<string>;
}

export interface AppliedPreset extends FailurePreset {
    failureCausedType: FailureCausedTypeCode;
    /** Failure kinds an operator may pick for this type. */
    failureKinds: string[];
}

export type AppendRecordOutcome =
    | { saved: true; verification: 'pass'; batchFile: string; line: string }
    | { saved: false; verification: Exclude<SerialVerification, 'pass'> };

/**
 * Pass when every board FID appears among the comma-separated SNR tokens.
 * Incomplete while either side is still empty.
 */
export function verifyBoardSerials(boardFIDs: string[], snrText: string | undefined): SerialVerification {
    const boards = boardFIDs.map(fid => fid.trim()).filter(Boolean);
    const snr = snrText?.trim() ?? '';
    if (boards.length === 0 || snr.length === 0) {
        return 'incomplete';
    }
    const tokens = snr.split(',').map(token => token.trim());
    return boards.every(board => tokens.includes(board)) ? 'pass' : 'fail';
}

/** Fcode a draft is saved with: its own, else the catalog's for a known failure kind, else empty. */
export function defaultFcodeFor(draft: Pick<RepairDraft, 'fcode' | 'failureKind'>): string {
    const explicit = draft.fcode?.trim();
    if (explicit) {
        return explicit;
    }
    return failureCatalog.fcodeByFailureKind[draft.failureKind] ?? '';
}

/**
 * Renders a draft as a 13-field ledger line. Fields are joined with ", ",
 * except repair action and engineer which are joined by a bare comma.
 */
export function composeLine(draft: RepairDraft): string {
    const boards = draft.boardFIDs.map(fid => fid.trim()).filter(Boolean).join(' ');
    const leading = [
        draft.productFID.trim(),
        boards,
        draft.failureCausedType,
        draft.failureCausedTypeText ?? draft.failureCausedType,
        draft.repairResult,
        draft.remarks,
        draft.componentLocation,
        draft.repairComponentA5E,
        draft.type,
        draft.failureKind,
        defaultFcodeFor(draft),
        draft.repairAction,
    ];
    return `${leading.join(', ')},${draft.engineer}`;
}

/**
 * Operator-side workflow: turns verified repair drafts into ledger lines in a batch file
 * and hands finished batches to the task manager.
 */
@singleton()
export class RecordComposerService {
    private readonly serviceBaseLogger: Logger;
    private recordDirectory?: string;
    private textSource?: TextSource;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(LedgerFileService) private ledgerFileService: LedgerFileService,
        @inject(UploadTaskManagerService) private taskSubmitter: BatchSubmitter,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger('app', { service: 'RecordComposerService' });
    }

    private getMethodLogger(methodName: string): Logger {
        return this.serviceBaseLogger.child({ serviceMethod: `RecordComposerService.${methodName}` });
    }

    /** Sets the source `captureSerials()` reads from, or clears it. */
    useTextSource(source: TextSource | undefined): void {
        this.textSource = source;
    }

    /**
     * Directory new batch files go to: the configured one, else `~/Documents/RepairTool`,
     * else the working directory. Resolved once.
     */
    resolveRecordDirectory(): string {
        if (this.recordDirectory) {
            return this.recordDirectory;
        }
        const logger = this.getMethodLogger('resolveRecordDirectory');
        const candidates = [
            this.configService.recordDirectory,
            path.join(os.homedir(), 'Documents', 'RepairTool'),
        ];
        for (const candidate of candidates) {
            try {
                fs.mkdirSync(candidate, { recursive: true });
                fs.accessSync(candidate, fs.constants.W_OK);
                this.recordDirectory = candidate;
                logger.info({ directory: candidate, event: 'record_directory_resolved' });
                return candidate;
            } catch (error: unknown) {
                logger.warn({ directory: candidate, err: getErrorMessageAndStack(error).message, event: 'record_directory_unusable' });
            }
        }
        this.recordDirectory = process.cwd();
        logger.warn({ directory: this.recordDirectory, event: 'record_directory_cwd_fallback' }, 'Using working directory for records.');
        return this.recordDirectory;
    }

    /** Path of a new, not yet written batch file. */
    createBatchFile(now: Date = new Date()): string {
        return path.join(this.resolveRecordDirectory(), `${BATCH_FILE_PREFIX}${format(now, BATCH_TIMESTAMP_FORMAT)}.txt`);
    }

    async captureSerials(): Promise<string | undefined> {
        if (!this.textSource) {
            return undefined;
        }
        const text = await this.textSource.readText();
        const trimmed = text.trim();
        return trimmed.length > 0 ? trimmed : undefined;
    }

    applyPreset(failureCausedType: FailureCausedTypeCode): AppliedPreset {
        return {
            ...presetFor(failureCausedType),
            failureCausedType,
            failureKinds: failureKindsFor(failureCausedType),
        };
    }

    /**
     * Verifies the board serials and, when they pass, appends the draft to `batchFile`
     * (or to a new batch file). Nothing is written otherwise.
     */
    async appendRecord(batchFile: string | undefined, draft: RepairDraft, snrText: string | undefined): Promise<AppendRecordOutcome> {
        const logger = this.getMethodLogger('appendRecord');
        const verification = verifyBoardSerials(draft.boardFIDs, snrText);
        if (verification !== 'pass') {
            logger.info({ productFID: draft.productFID, verification, event: 'record_not_saved' }, 'Board serials not verified.');
            return { saved: false, verification };
        }

        const line = composeLine(draft);
        const target = batchFile ?? this.createBatchFile();
        const written = await this.ledgerFileService.appendLine(target, line, logger);
        logger.info({ productFID: draft.productFID, batchFile: written, event: 'record_saved' });
        return { saved: true, verification, batchFile: written, line };
    }

    async removeRecord(batchFile: string, productFID: string): Promise<number> {
        return this.ledgerFileService.deleteRecord(batchFile, productFID, this.getMethodLogger('removeRecord'));
    }

    /** Starts a normal upload task on the batch file. */
    async submitBatch(batchFile: string): Promise<string> {
        if (!(await this.ledgerFileService.exists(batchFile))) {
            throw new BatchFileNotFoundError(batchFile);
        }
        const taskId = await this.taskSubmitter.startTask(batchFile, false);
        this.getMethodLogger('submitBatch').info({ batchFile, taskId, event: 'batch_submitted' });
        return taskId;
    }
}
