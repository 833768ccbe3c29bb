// src/utils/upload/ledger.utils.ts
import path from 'path';
import { LedgerLine, RepairRecord, UploadMode, UploadResult } from '../../types/upload.types';
import { CATEGORY_LABELS } from './errorClassifier';

export const STATUS_SEPARATOR = ' // ';
export const SUCCESS_STATUS = 'success';
export const MIN_RECORD_FIELDS = 13;

const OUTCOME_MARKER_REGEX = /_(fail|done)$/;

/**
 * Trims every line and drops blank ones.
 */
export function normalizeLedgerText(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/** Splits a persisted line once on ` // `. */
export function parseLedgerLine(line: string): LedgerLine {
    const trimmed = line.trim();
    const separatorIndex = trimmed.indexOf(STATUS_SEPARATOR);
    if (separatorIndex === -1) {
        return { rawContent: trimmed };
    }
    return {
        rawContent: trimmed.slice(0, separatorIndex).trim(),
        statusSuffix: trimmed.slice(separatorIndex + STATUS_SEPARATOR.length).trim(),
    };
}

export function renderLedgerLine(line: LedgerLine): string {
    return line.statusSuffix !== undefined
        ? `${line.rawContent}${STATUS_SEPARATOR}${line.statusSuffix}`
        : line.rawContent;
}

export const isSuccessLine = (line: LedgerLine): boolean => line.statusSuffix === SUCCESS_STATUS;

/**
 * Lines a worker should process, with status suffixes stripped.
 * Retry mode keeps only lines that are not `success`; filtering its own output again returns it unchanged.
 */
export function selectLinesForMode(lines: LedgerLine[], mode: UploadMode): string[] {
    const selected = mode === 'retry' ? lines.filter(line => !isSuccessLine(line)) : lines;
    return selected.map(line => line.rawContent);
}

export function splitRecordFields(originalLine: string): string[] {
    return originalLine.split(',').map(field => field.trim());
}

/** Display id of a line: its first field, or `记录<n>` when that is empty. */
export function displayIdFor(fields: string[], index: number): string {
    const first = fields[0];
    return first ? first : `记录${index + 1}`;
}

/**
 * Parses a record line, or returns `undefined` when it has fewer than 13 fields.
 */
export function parseRepairRecord(originalLine: string): RepairRecord | undefined {
    const fields = splitRecordFields(originalLine);
    if (fields.length < MIN_RECORD_FIELDS) {
        return undefined;
    }
    const [productFID, boards, causedTypeCode, failureCausedType, repairResult, remarks, componentLocation,
        repairComponentA5E, type, failureKind, fcode, repairAction, engineer] = fields;
    return {
        productFID,
        boardFIDs: boards.split(/\s+/).filter(Boolean),
        failureCausedTypeCode: causedTypeCode,
        repairData: {
            failureCausedType,
            repairResult,
            remarks,
            componentLocation,
            repairComponentA5E,
            type,
            failureKind,
            fcode,
            repairAction,
            engineer,
        },
    };
}

/**
 * Status text persisted for a result. Failures without a usable category fall back to `提交失败`.
 */
export function statusTextFor(result: UploadResult): string {
    if (result.success) {
        return SUCCESS_STATUS;
    }
    const category = result.errorCategory;
    return category && category !== 'fail' ? category : CATEGORY_LABELS.SubmissionFailure;
}

export function renderResultLine(result: UploadResult): LedgerLine {
    return { rawContent: result.originalLine, statusSuffix: statusTextFor(result) };
}

/**
 * Lays task results over the ledger the worker read.
 *
 * Normal mode: results replace lines one by one. Retry mode: lines already `success`
 * stay in place and each other line takes the next result. Lines no result reached keep
 * their previous rendering.
 */
export function mergeResultsIntoLedger(ledger: LedgerLine[], results: UploadResult[], mode: UploadMode): LedgerLine[] {
    let cursor = 0;
    const merged = ledger.map(line => {
        if (mode === 'retry' && isSuccessLine(line)) {
            return line;
        }
        if (cursor < results.length) {
            return renderResultLine(results[cursor++]);
        }
        return line;
    });
    // Results beyond the ledger (file changed underneath the worker) are appended, not lost
    for (; cursor < results.length; cursor++) {
        merged.push(renderResultLine(results[cursor]));
    }
    return merged;
}

/** `<dir>/<base>` with extension and any `_fail`/`_done` marker removed. */
export function ledgerBasePath(filePath: string): string {
    const parsed = path.parse(filePath);
    return path.join(parsed.dir, parsed.name.replace(OUTCOME_MARKER_REGEX, ''));
}

export function deriveOutputPath(filePath: string, hasFailure: boolean): string {
    return `${ledgerBasePath(filePath)}${hasFailure ? '_fail' : '_done'}.txt`;
}

/**
 * Files a retry may read, in order of preference.
 */
export function retryCandidatePaths(originalFilePath: string): string[] {
    const base = ledgerBasePath(originalFilePath);
    return [originalFilePath, `${base}_fail.txt`, `${base}_done.txt`];
}

/**
 * True when the first comma-separated field of the line equals `productFID` exactly.
 * A line for `ABC1234` never matches `ABC123`.
 */
export function isExactProductMatch(lineContent: string, productFID: string): boolean {
    const [firstField] = lineContent.split(',');
    return firstField.trim() === productFID;
}

export function removeProductLines(lines: string[], productFID: string): { kept: string[]; removedCount: number } {
    const kept: string[] = [];
    let removedCount = 0;
    for (const line of lines) {
        const { rawContent } = parseLedgerLine(line);
        if (isExactProductMatch(rawContent, productFID)) {
            removedCount++;
        } else {
            kept.push(line);
        }
    }
    return { kept, removedCount };
}
