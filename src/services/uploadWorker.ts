// src/services/uploadWorker.ts
import EventEmitter from 'eventemitter3';
import { Logger } from 'pino';
import { RecordUploader } from '../types/legacySystem.types';
import {
    LedgerLine,
    UploadMode,
    UploadResult,
    UploadWorkerEvents,
    WorkerOutcome,
    WorkerSummary,
} from '../types/upload.types';
import { categorizeError, CATEGORY_LABELS } from '../utils/upload/errorClassifier';
import { displayIdFor, parseRepairRecord, selectLinesForMode, splitRecordFields } from '../utils/upload/ledger.utils';
import { pacingDelayFor, sleep as defaultSleep } from '../utils/upload/pacing';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/** The ledger operations a worker needs. */
export interface LedgerReader {
    exists(filePath: string): Promise<boolean>;
    readLedger(filePath: string, parentLogger?: Logger): Promise<LedgerLine[]>;
}

export interface UploadWorkerOptions {
    taskId: string;
    filePath: string;
    mode: UploadMode;
    uploader: RecordUploader;
    ledger: LedgerReader;
    logger: Logger;
    /** Pause between records; replaced in tests. */
    sleep?: (ms: number) => Promise<void>;
}

export const NOTHING_TO_RETRY_MESSAGE = '🎉 没有失败记录需要重试！';
export const RETRY_MESSAGE_PREFIX = '🔄 重试结果: ';

const formatSeconds = (ms: number): string => (ms / 1000).toFixed(1);

/**
 * Uploads every record of one ledger file through a single session.
 *
 * Emits `progress`, `status`, `record` and `finished`. After `cancel()` it emits nothing more
 * and resolves without a summary.
 */
export class UploadWorker extends EventEmitter<UploadWorkerEvents> {
    readonly taskId: string;
    readonly filePath: string;
    readonly mode: UploadMode;

    private readonly uploader: RecordUploader;
    private readonly ledger: LedgerReader;
    private readonly logger: Logger;
    private readonly sleep: (ms: number) => Promise<void>;

    private cancelled = false;
    private running = false;
    private completion?: Promise<WorkerSummary | undefined>;
    private readonly results: UploadResult[] = [];
    private ledgerLines: LedgerLine[] = [];

    constructor(options: UploadWorkerOptions) {
        super();
        this.taskId = options.taskId;
        this.filePath = options.filePath;
        this.mode = options.mode;
        this.uploader = options.uploader;
        this.ledger = options.ledger;
        this.logger = options.logger.child({ service: 'UploadWorker' });
        this.sleep = options.sleep ?? defaultSleep;
    }

    get isCancelled(): boolean {
        return this.cancelled;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /** Starts the run in the background; the outcome arrives through `finished`. */
    start(): void {
        if (this.completion) {
            return;
        }
        this.running = true;
        this.completion = this.run()
            .catch((error: unknown) => {
                // Only a throwing listener can land here
                this.logger.error({ event: 'worker_listener_error', err: getErrorMessageAndStack(error) }, 'Worker event listener threw.');
                return undefined;
            })
            .finally(() => {
                this.running = false;
            });
    }

    cancel(): void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.logger.info({ event: 'worker_cancel_requested' }, 'Cancellation requested.');
        }
    }

    /**
     * Resolves `true` once the run has ended, or `false` when `timeoutMs` passes first.
     */
    async waitForCompletion(timeoutMs: number): Promise<boolean> {
        if (!this.completion) {
            return true;
        }
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<false>(resolve => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });
        try {
            return await Promise.race([this.completion.then(() => true), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private emitProgress(percent: number): void {
        if (!this.cancelled) this.emit('progress', percent);
    }

    private emitStatus(text: string): void {
        if (!this.cancelled) this.emit('status', text);
    }

    private recordResult(result: UploadResult): void {
        this.results.push(result);
        if (!this.cancelled) {
            this.emit('record', {
                productFID: result.productFID,
                success: result.success,
                reason: result.success ? undefined : result.errorCategory,
            });
        }
    }

    private finish(outcome: WorkerOutcome, message: string, startedAt: number): WorkerSummary {
        const successCount = this.results.filter(r => r.success).length;
        const summary: WorkerSummary = {
            outcome,
            success: outcome !== 'failure',
            message,
            results: [...this.results],
            ledgerLines: this.ledgerLines,
            successCount,
            failureCount: this.results.length - successCount,
            elapsedMs: Date.now() - startedAt,
            mode: this.mode,
        };
        this.logger.info({
            event: 'worker_finished',
            outcome,
            successCount: summary.successCount,
            failureCount: summary.failureCount,
            elapsedMs: summary.elapsedMs,
        }, message);
        if (!this.cancelled) {
            this.emit('finished', summary);
        }
        return summary;
    }

    async run(): Promise<WorkerSummary | undefined> {
        const startedAt = Date.now();
        try {
            return await this.execute(startedAt);
        } catch (error: unknown) {
            if (this.cancelled) {
                return undefined;
            }
            const { message, stack } = getErrorMessageAndStack(error);
            this.logger.error({ event: 'worker_unhandled_error', err: { message, stack } }, 'Upload worker failed.');
            return this.finish('failure', `上传异常: ${categorizeError(message)}`, startedAt);
        }
    }

    private async execute(startedAt: number): Promise<WorkerSummary | undefined> {
        if (this.cancelled) return undefined;

        if (!(await this.ledger.exists(this.filePath))) {
            return this.finish('failure', `文件不存在: ${this.filePath}`, startedAt);
        }

        this.emitStatus('正在连接系统...');

        try {
            this.ledgerLines = await this.ledger.readLedger(this.filePath, this.logger);
        } catch (error: unknown) {
            return this.finish('failure', `文件读取失败: ${getErrorMessageAndStack(error).message}`, startedAt);
        }
        if (this.ledgerLines.length === 0) {
            return this.finish('failure', '文件为空', startedAt);
        }
        this.emitProgress(10);

        const lines = selectLinesForMode(this.ledgerLines, this.mode);
        if (this.mode === 'retry' && lines.length === 0) {
            return this.finish('success', NOTHING_TO_RETRY_MESSAGE, startedAt);
        }

        if (this.cancelled) return undefined;

        const connectStartedAt = Date.now();
        const auth = await this.uploader.authenticate();
        if (this.cancelled) return undefined;

        if (!auth.ok) {
            return this.failAll(lines, categorizeError(auth.message), startedAt);
        }
        this.emitStatus(`系统连接成功 (耗时: ${formatSeconds(Date.now() - connectStartedAt)}s)`);
        this.emitProgress(20);

        this.emitProgress(30);
        return this.processLines(lines, startedAt);
    }

    /** Connection failed: every selected line fails with the same category, no per-record call. */
    private failAll(lines: string[], label: string, startedAt: number): WorkerSummary | undefined {
        this.emitStatus(`连接失败: ${label}`);
        for (const [index, line] of lines.entries()) {
            if (this.cancelled) return undefined;
            this.recordResult({
                originalLine: line,
                success: false,
                errorCategory: label,
                productFID: displayIdFor(splitRecordFields(line), index),
            });
        }
        return this.finish('failure', `连接失败: ${label}\n❌ 失败：${lines.length}条记录`, startedAt);
    }

    private async processLines(lines: string[], startedAt: number): Promise<WorkerSummary | undefined> {
        const parsed = lines.map(line => ({ line, record: parseRepairRecord(line) }));
        const validTotal = parsed.filter(entry => entry.record !== undefined).length;
        const loopStartedAt = Date.now();
        let processed = 0;
        let successCount = 0;

        for (const [index, { line, record }] of parsed.entries()) {
            if (this.cancelled) return undefined;

            if (!record) {
                const productFID = displayIdFor(splitRecordFields(line), index);
                this.logger.warn({ event: 'record_format_error', productFID }, 'Line has fewer than 13 fields.');
                this.recordResult({ originalLine: line, success: false, errorCategory: CATEGORY_LABELS.FormatError, productFID });
                continue;
            }

            const { productFID, repairData } = record;
            this.emitStatus(`处理 ${processed + 1}/${validTotal}: ${productFID}`);
            const recordStartedAt = Date.now();

            let success: boolean;
            let errorDetail: string | undefined;
            try {
                const outcome = await this.uploader.processRecord(productFID, repairData);
                success = outcome.success;
                errorDetail = outcome.error;
            } catch (error: unknown) {
                success = false;
                errorDetail = getErrorMessageAndStack(error).message;
            }
            const took = formatSeconds(Date.now() - recordStartedAt);

            if (success) {
                successCount++;
                this.recordResult({ originalLine: line, success: true, productFID });
                this.emitStatus(`✅ ${productFID} 成功 (${took}s)`);
            } else {
                const label = categorizeError(errorDetail);
                this.recordResult({ originalLine: line, success: false, errorCategory: label, productFID });
                this.emitStatus(`❌ ${productFID} ${label} (${took}s)`);
                this.logger.info({ event: 'record_failed', productFID, errorDetail, label });
            }

            processed++;
            this.emitProgress(30 + Math.floor((processed / validTotal) * 60));

            if (this.cancelled) return undefined;
            if (processed < validTotal) {
                await this.sleep(pacingDelayFor(successCount, processed));
            }
        }

        if (this.cancelled) return undefined;
        this.emitProgress(100);
        return this.summarize(startedAt, loopStartedAt);
    }

    private summarize(startedAt: number, loopStartedAt: number): WorkerSummary {
        const total = this.results.length;
        const successCount = this.results.filter(r => r.success).length;
        const failedCount = total - successCount;
        const prefix = this.mode === 'retry' ? RETRY_MESSAGE_PREFIX : '';
        const elapsed = formatSeconds(Date.now() - loopStartedAt);

        if (failedCount === 0) {
            return this.finish('success', `${prefix}🎉 全部成功！${successCount}条记录\n⚡ 总耗时:${elapsed}s`, startedAt);
        }
        if (successCount > 0) {
            return this.finish('partial', `${prefix}⚠️ 部分成功：${successCount}/${total}\n❌ 失败：${failedCount}条\n⚡ 总耗时:${elapsed}s`, startedAt);
        }
        return this.finish('failure', `${prefix}❌ 全部失败！${failedCount}条记录`, startedAt);
    }
}
