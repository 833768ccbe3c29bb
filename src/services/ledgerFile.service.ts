// src/services/ledgerFile.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from 'pino';
import iconv from 'iconv-lite';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LedgerLine, UploadMode, UploadResult } from '../types/upload.types';
import { BatchFileNotFoundError, LedgerWriteError } from '../types/legacySystem.types';
import {
    deriveOutputPath,
    isSuccessLine,
    mergeResultsIntoLedger,
    normalizeLedgerText,
    parseLedgerLine,
    removeProductLines,
    renderLedgerLine,
} from '../utils/upload/ledger.utils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export interface LedgerRewriteOutcome {
    previousPath: string;
    newPath: string;
    hasFailure: boolean;
    lineCount: number;
}

/**
 * File I/O for ledger files: read, rewrite with status suffixes, rename by outcome,
 * remove records and append new ones.
 */
@singleton()
export class LedgerFileService {
    private readonly serviceBaseLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger('app', { service: 'LedgerFileServiceBase' });
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.serviceBaseLogger;
        return base.child({ serviceMethod: `LedgerFileService.${methodName}` });
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fs.promises.access(filePath, fs.constants.R_OK);
            return true;
        } catch {
            return false;
        }
    }

    /** Non-blank, trimmed lines of a ledger, split into content and status. */
    async readLedger(filePath: string, parentLogger?: Logger): Promise<LedgerLine[]> {
        const logger = this.getMethodLogger(parentLogger, 'readLedger');
        const content = await fs.promises.readFile(filePath, 'utf8');
        const lines = normalizeLedgerText(content).map(parseLedgerLine);
        logger.trace({ filePath, lineCount: lines.length, event: 'ledger_read' });
        return lines;
    }

    private async writeLines(filePath: string, lines: string[]): Promise<void> {
        const body = lines.length > 0 ? `${lines.join('\n')}\n` : '';
        await fs.promises.writeFile(filePath, body, 'utf8');
    }

    /**
     * Writes task results over the ledger the worker read, to `<base>_fail.txt` or `<base>_done.txt`.
     * The previous file is removed only after the new one is written, and only when the name changed.
     * Returns `undefined` when there is nothing to write.
     */
    async writeResults(
        filePath: string,
        ledger: LedgerLine[],
        results: UploadResult[],
        mode: UploadMode,
        parentLogger?: Logger,
    ): Promise<LedgerRewriteOutcome | undefined> {
        const logger = this.getMethodLogger(parentLogger, 'writeResults');
        if (results.length === 0) {
            logger.debug({ filePath, event: 'ledger_rewrite_skipped_no_results' }, 'No results, ledger left untouched.');
            return undefined;
        }

        const merged = mergeResultsIntoLedger(ledger, results, mode);
        const hasFailure = merged.some(line => !isSuccessLine(line));
        const newPath = deriveOutputPath(filePath, hasFailure);

        try {
            await this.writeLines(newPath, merged.map(renderLedgerLine));
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            logger.error({ filePath, newPath, err: message, event: 'ledger_rewrite_failed' }, 'Could not write result ledger.');
            throw new LedgerWriteError(newPath, message);
        }

        if (path.resolve(newPath) !== path.resolve(filePath) && await this.exists(filePath)) {
            try {
                await fs.promises.unlink(filePath);
            } catch (error: unknown) {
                logger.warn({ filePath, err: getErrorMessageAndStack(error).message, event: 'ledger_old_file_delete_failed' }, 'Could not delete previous ledger file.');
            }
        }

        logger.info({ previousPath: filePath, newPath, hasFailure, lineCount: merged.length, event: 'ledger_rewritten' }, 'Ledger rewritten with results.');
        return { previousPath: filePath, newPath, hasFailure, lineCount: merged.length };
    }

    /**
     * Drops every line whose first field equals `productFID`. Returns the number of lines removed;
     * the file is rewritten only when that is above zero. Throws `BatchFileNotFoundError` when the
     * ledger is gone.
     */
    async deleteRecord(filePath: string, productFID: string, parentLogger?: Logger): Promise<number> {
        const logger = this.getMethodLogger(parentLogger, 'deleteRecord');
        if (!(await this.exists(filePath))) {
            logger.warn({ filePath, productFID, event: 'ledger_record_delete_missing_file' }, 'Ledger file not found.');
            throw new BatchFileNotFoundError(filePath);
        }
        const content = await fs.promises.readFile(filePath, 'utf8');
        const lines = content.split(/\r?\n/).filter(line => line.trim().length > 0);
        const { kept, removedCount } = removeProductLines(lines, productFID);

        if (removedCount > 0) {
            await this.writeLines(filePath, kept);
        }
        logger.info({ filePath, productFID, removedCount, event: 'ledger_record_deleted' }, `Removed ${removedCount} line(s) for ${productFID}.`);
        return removedCount;
    }

    /**
     * Appends one line. Tries UTF-8, then the configured legacy encoding, then a backup file in the
     * OS temp directory. Returns the file that received the line.
     */
    async appendLine(filePath: string, line: string, parentLogger?: Logger): Promise<string> {
        const logger = this.getMethodLogger(parentLogger, 'appendLine');
        let targetPath = filePath;
        try {
            await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        } catch (error: unknown) {
            targetPath = path.join(process.cwd(), path.basename(filePath));
            logger.warn({ filePath, targetPath, err: getErrorMessageAndStack(error).message, event: 'ledger_dir_unavailable' }, 'Ledger directory unavailable, using working directory.');
        }

        const data = `${line}\n`;
        const failures: string[] = [];
        const legacyEncoding = this.configService.ledgerLegacyEncoding;
        const attempts: Array<{ target: string; encoding: string; label: string; encode: () => Buffer }> = [
            { target: targetPath, encoding: 'utf8', label: 'utf8', encode: () => Buffer.from(data, 'utf8') },
            { target: targetPath, encoding: legacyEncoding, label: 'legacy', encode: () => iconv.encode(data, legacyEncoding) },
            {
                target: path.join(os.tmpdir(), `repair_backup_${Math.floor(Date.now() / 1000)}.txt`),
                encoding: 'utf8',
                label: 'temp',
                encode: () => Buffer.from(data, 'utf8'),
            },
        ];

        for (const attempt of attempts) {
            try {
                await fs.promises.appendFile(attempt.target, attempt.encode());
                if (attempt.target !== targetPath) {
                    logger.warn({ filePath, backupPath: attempt.target, event: 'ledger_append_temp_fallback' }, 'Record saved to temporary backup file.');
                }
                return attempt.target;
            } catch (error: unknown) {
                const { message } = getErrorMessageAndStack(error);
                failures.push(`${attempt.label}: ${message}`);
                logger.warn({ target: attempt.target, encoding: attempt.encoding, err: message, event: 'ledger_append_attempt_failed' });
            }
        }

        throw new LedgerWriteError(filePath, failures.join('; '));
    }
}
