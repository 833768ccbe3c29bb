// src/services/uploadTaskManager.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import EventEmitter from 'eventemitter3';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LedgerFileService } from './ledgerFile.service';
import { UploadWorker } from './uploadWorker';
import { UploadWorkerFactory, UploadWorkerCreator } from './uploadWorker.factory';
import {
    UploadMode,
    UploadTaskEvents,
    UploadTaskSnapshot,
    UploadTaskStatus,
    WorkerSummary,
} from '../types/upload.types';
import { RetryFileNotFoundError, TaskBusyError, TaskNotFoundError } from '../types/legacySystem.types';
import { retryCandidatePaths } from '../utils/upload/ledger.utils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const TASK_ID_LENGTH = 8;

type TaskSummary = Omit<WorkerSummary, 'ledgerLines'>;

interface ManagedTask {
    id: string;
    /** File the task was started on; retry candidates derive from it. */
    originalFilePath: string;
    /** Current ledger location, updated after a `_fail`/`_done` rename. */
    filePath: string;
    mode: UploadMode;
    worker?: UploadWorker;
    status: UploadTaskStatus;
    progress: number;
    lastStatusText: string;
    createdAt: Date;
    finishedAt?: Date;
    summary?: TaskSummary;
    logger: Logger;
}

/**
 * Registry of upload tasks. Each task owns one worker with its own session;
 * when a worker finishes, its results are written back to the ledger file.
 *
 * Re-emits worker events as `task:*` events carrying the task id.
 */
@singleton()
export class UploadTaskManagerService extends EventEmitter<UploadTaskEvents> {
    private readonly serviceBaseLogger: Logger;
    private readonly tasks: Map<string, ManagedTask> = new Map();
    private readonly mutex = new Mutex();

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(LedgerFileService) private ledgerFileService: LedgerFileService,
        @inject(UploadWorkerFactory) private workerFactory: UploadWorkerCreator,
    ) {
        super();
        this.serviceBaseLogger = this.loggingService.getLogger('app', { service: 'UploadTaskManagerService' });
    }

    private generateTaskId(): string {
        let id: string;
        do {
            id = uuidv4().replace(/-/g, '').slice(0, TASK_ID_LENGTH);
        } while (this.tasks.has(id));
        return id;
    }

    private requireTask(taskId: string): ManagedTask {
        const task = this.tasks.get(taskId);
        if (!task) {
            throw new TaskNotFoundError(taskId);
        }
        return task;
    }

    /**
     * Registers a task and starts its worker in the background. Resolves with the task id
     * as soon as the worker is started.
     */
    async startTask(filePath: string, retryMode = false): Promise<string> {
        return this.mutex.runExclusive(() => this.launch(filePath, retryMode ? 'retry' : 'normal'));
    }

    /** Must be called with the mutex held. */
    private launch(filePath: string, mode: UploadMode): string {
        const taskId = this.generateTaskId();
        const logger = this.loggingService.getTaskLogger(taskId, { service: 'UploadTask', mode });
        const worker = this.workerFactory.create({ taskId, filePath, mode, logger });

        const task: ManagedTask = {
            id: taskId,
            originalFilePath: filePath,
            filePath,
            mode,
            worker,
            status: 'running',
            progress: 0,
            lastStatusText: '',
            createdAt: new Date(),
            logger,
        };
        this.tasks.set(taskId, task);
        this.wireWorker(task, worker);

        logger.info({ event: 'task_started', filePath, mode }, `Upload task ${taskId} started.`);
        worker.start();
        return taskId;
    }

    private wireWorker(task: ManagedTask, worker: UploadWorker): void {
        const taskId = task.id;
        worker.on('progress', percent => {
            task.progress = percent;
            this.emit('task:progress', { taskId, percent });
        });
        worker.on('status', text => {
            task.lastStatusText = text;
            this.emit('task:status', { taskId, text });
        });
        worker.on('record', event => {
            this.emit('task:record', { taskId, ...event });
        });
        worker.on('finished', summary => {
            this.onTaskFinished(taskId, worker, summary).catch((error: unknown) => {
                this.serviceBaseLogger.error({ taskId, event: 'task_finish_handling_failed', err: getErrorMessageAndStack(error) }, 'Could not complete task bookkeeping.');
            });
        });
    }

    /**
     * Writes results back to the ledger, follows the rename, stores the summary and releases the worker.
     * Ignored when the worker no longer belongs to a registered task.
     */
    async onTaskFinished(taskId: string, worker: UploadWorker, summary: WorkerSummary): Promise<void> {
        await this.mutex.runExclusive(async () => {
            const task = this.tasks.get(taskId);
            if (!task || task.worker !== worker) {
                this.serviceBaseLogger.warn({ taskId, event: 'task_finished_for_unknown_worker' }, 'Finished worker is no longer registered.');
                return;
            }
            const logger = task.logger.child({ serviceMethod: 'UploadTaskManagerService.onTaskFinished' });

            try {
                const rewrite = await this.ledgerFileService.writeResults(
                    task.filePath, summary.ledgerLines, summary.results, summary.mode, logger,
                );
                if (rewrite && rewrite.newPath !== rewrite.previousPath) {
                    task.filePath = rewrite.newPath;
                    this.emit('task:file-renamed', { taskId, oldPath: rewrite.previousPath, newPath: rewrite.newPath });
                }
            } catch (error: unknown) {
                // Results stay in the summary; the ledger keeps its previous content
                logger.error({ event: 'task_ledger_rewrite_failed', err: getErrorMessageAndStack(error) }, 'Ledger rewrite failed.');
            }

            const { ledgerLines: _ledgerLines, ...taskSummary } = summary;
            task.summary = taskSummary;
            task.status = summary.outcome;
            task.progress = 100;
            task.finishedAt = new Date();
            task.worker?.removeAllListeners();
            task.worker = undefined;

            logger.info({ event: 'task_finished', outcome: summary.outcome, filePath: task.filePath }, summary.message);
            await this.loggingService.closeTaskLogger(taskId);
            // The task file stream is closed; later calls on a kept task log to the app logger
            task.logger = this.serviceBaseLogger.child({ taskId });
            this.emit('task:finished', { taskId, summary: taskSummary });
        });
    }

    /**
     * Starts a retry task on the best remaining ledger of `taskId`: the original file, then
     * `<base>_fail.txt`, then `<base>_done.txt`. The old task is stopped and removed.
     */
    async retry(taskId: string): Promise<string> {
        return this.mutex.runExclusive(async () => {
            const task = this.requireTask(taskId);
            const candidates = retryCandidatePaths(task.originalFilePath);

            let target: string | undefined;
            for (const candidate of candidates) {
                if (await this.ledgerFileService.exists(candidate)) {
                    target = candidate;
                    break;
                }
            }
            if (!target) {
                task.logger.warn({ event: 'retry_file_not_found', candidates }, 'No ledger file to retry.');
                throw new RetryFileNotFoundError(taskId, candidates);
            }

            await this.stopWorker(task);
            await this.discard(task);
            const newTaskId = this.launch(target, 'retry');
            this.serviceBaseLogger.info({ event: 'task_retry_started', taskId, newTaskId, filePath: target }, `Task ${taskId} retried as ${newTaskId}.`);
            return newTaskId;
        });
    }

    /** Cancels the worker and waits a bounded time for it; a worker that outlives the wait is abandoned. */
    private async stopWorker(task: ManagedTask): Promise<void> {
        const worker = task.worker;
        if (!worker) {
            return;
        }
        worker.cancel();
        const ended = await worker.waitForCompletion(this.configService.taskStopWaitMs);
        if (!ended) {
            task.logger.warn({ event: 'worker_abandoned', waitMs: this.configService.taskStopWaitMs }, 'Worker did not stop in time, abandoning it.');
        }
        worker.removeAllListeners();
        task.worker = undefined;
        task.status = 'cancelled';
    }

    private async discard(task: ManagedTask): Promise<void> {
        this.tasks.delete(task.id);
        this.emit('task:removed', { taskId: task.id });
        await this.loggingService.closeTaskLogger(task.id);
    }

    /**
     * Removes every line of the task's current ledger whose product FID equals `productFID`.
     * Refused while the task's worker is running. Returns the number of removed lines.
     */
    async deleteRecord(taskId: string, productFID: string): Promise<number> {
        return this.mutex.runExclusive(async () => {
            const task = this.requireTask(taskId);
            if (task.worker?.isRunning) {
                throw new TaskBusyError(taskId);
            }
            const logger = this.serviceBaseLogger.child({ taskId, serviceMethod: 'UploadTaskManagerService.deleteRecord' });
            return this.ledgerFileService.deleteRecord(task.filePath, productFID, logger);
        });
    }

    /** Cancels the task's worker and forgets the task. The ledger file is left as it is. */
    async removeTask(taskId: string): Promise<void> {
        await this.mutex.runExclusive(async () => {
            const task = this.requireTask(taskId);
            if (task.worker) {
                task.worker.cancel();
                task.worker.removeAllListeners();
                task.worker = undefined;
            }
            await this.discard(task);
            this.serviceBaseLogger.info({ event: 'task_removed', taskId }, `Task ${taskId} removed.`);
        });
    }

    private toSnapshot(task: ManagedTask): UploadTaskSnapshot {
        return {
            id: task.id,
            filePath: task.filePath,
            originalFilePath: task.originalFilePath,
            mode: task.mode,
            status: task.status,
            progress: task.progress,
            lastStatusText: task.lastStatusText,
            createdAt: task.createdAt.toISOString(),
            finishedAt: task.finishedAt?.toISOString(),
            summary: task.summary,
        };
    }

    listTasks(): UploadTaskSnapshot[] {
        return Array.from(this.tasks.values(), task => this.toSnapshot(task));
    }

    getTask(taskId: string): UploadTaskSnapshot {
        return this.toSnapshot(this.requireTask(taskId));
    }

    /** Stops every running worker. Used on process shutdown. */
    async shutdown(): Promise<void> {
        await this.mutex.runExclusive(async () => {
            const running = Array.from(this.tasks.values()).filter(task => task.worker);
            this.serviceBaseLogger.info({ event: 'task_manager_shutdown', runningCount: running.length }, 'Stopping upload tasks.');
            await Promise.all(running.map(task => this.stopWorker(task)));
        });
    }
}
