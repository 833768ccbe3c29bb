// src/services/uploadWorker.factory.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LedgerFileService } from './ledgerFile.service';
import { LegacySessionClient } from './legacySession.client';
import { UploadWorker } from './uploadWorker';
import { UploadMode } from '../types/upload.types';

export interface CreateWorkerParams {
    taskId: string;
    filePath: string;
    mode: UploadMode;
    logger: Logger;
}

export interface UploadWorkerCreator {
    create(params: CreateWorkerParams): UploadWorker;
}

/**
 * Builds a worker with its own session client, so no cookies or caches are shared between tasks.
 */
@singleton()
export class UploadWorkerFactory implements UploadWorkerCreator {
    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LedgerFileService) private ledgerFileService: LedgerFileService,
    ) { }

    create({ taskId, filePath, mode, logger }: CreateWorkerParams): UploadWorker {
        const uploader = new LegacySessionClient(this.configService.legacySystemConfig, logger);
        return new UploadWorker({
            taskId,
            filePath,
            mode,
            uploader,
            ledger: this.ledgerFileService,
            logger,
        });
    }
}
