// src/container.ts
import 'reflect-metadata';
import { container } from 'tsyringe';

// --- Core Application Services and Configurations ---
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';

// --- Upload Feature Services ---
import { LedgerFileService } from './services/ledgerFile.service';
import { UploadWorkerFactory } from './services/uploadWorker.factory';
import { UploadTaskManagerService } from './services/uploadTaskManager.service';
import { RecordComposerService } from './services/recordComposer.service';

/**
 * Configure the Tsyringe IoC container by registering all application services.
 */

// --- 1. Register Core Application Services (Singletons) ---
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);

// --- 2. Register Upload Services (Singletons) ---
// Session clients and workers are per task and built by UploadWorkerFactory, not registered here.
container.registerSingleton(LedgerFileService);
container.registerSingleton(UploadWorkerFactory);
container.registerSingleton(UploadTaskManagerService);
container.registerSingleton(RecordComposerService);

export default container;
