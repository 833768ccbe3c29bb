// src/services/recordComposer.service.test.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LedgerFileService } from './ledgerFile.service';
import { BatchSubmitter, RecordComposerService, composeLine, verifyBoardSerials } from './recordComposer.service';
import { BatchFileNotFoundError } from '../types/legacySystem.types';
import { RepairDraft } from '../types/upload.types';
import { parseRepairRecord } from '../utils/upload/ledger.utils';

const DRAFT: RepairDraft = {
    productFID: 'P100',
    boardFIDs: ['B1', 'B2'],
    failureCausedType: '1',
    repairResult: 'Repaired',
    remarks: 'cracked joint',
    componentLocation: 'D12',
    repairComponentA5E: 'A5E001',
    type: 'General component or process',
    failureKind: 'diode faulty',
    repairAction: 'Replace',
    engineer: 'E7',
};

describe('verifyBoardSerials', () => {
    it.each<[string[], string | undefined, string]>([
        [['B1', 'B2'], 'B2, X9 ,B1', 'pass'],
        [['B1', 'B3'], 'B1,B2', 'fail'],
        [[], 'B1', 'incomplete'],
        [['B1'], '   ', 'incomplete'],
        [['B1'], undefined, 'incomplete'],
    ])('boards %j against %p is %s', (boards, snr, expected) => {
        expect(verifyBoardSerials(boards, snr)).toBe(expected);
    });
});

describe('composeLine', () => {
    it('renders the 13 ledger fields with the catalog fcode', () => {
        const line = composeLine(DRAFT);

        expect(line).toBe('P100, B1 B2, 1, 1, Repaired, cracked joint, D12, A5E001, General component or process, diode faulty, F330, Replace,E7');
        expect(parseRepairRecord(line)).toEqual({
            productFID: 'P100',
            boardFIDs: ['B1', 'B2'],
            failureCausedTypeCode: '1',
            repairData: {
                failureCausedType: '1',
                repairResult: 'Repaired',
                remarks: 'cracked joint',
                componentLocation: 'D12',
                repairComponentA5E: 'A5E001',
                type: 'General component or process',
                failureKind: 'diode faulty',
                fcode: 'F330',
                repairAction: 'Replace',
                engineer: 'E7',
            },
        });
    });

    it('keeps an explicit fcode and leaves unknown kinds without one', () => {
        expect(composeLine({ ...DRAFT, fcode: 'F999' }).split(', ')[10]).toBe('F999');
        expect(composeLine({ ...DRAFT, failureKind: 'unlisted' }).split(', ')[10]).toBe('');
    });
});

describe('RecordComposerService', () => {
    let workDir: string;
    let submitter: { startTask: jest.Mock<Promise<string>, [string, boolean?]> };
    let composer: RecordComposerService;

    beforeEach(async () => {
        workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'composer-test-'));
        process.env.RECORD_DIRECTORY = path.join(workDir, 'records');
        const config = new ConfigService();
        const logging = new LoggingService(config);
        submitter = { startTask: jest.fn(async (_filePath: string, _retryMode?: boolean) => 'task0001') };
        const taskSubmitter: BatchSubmitter = submitter;
        composer = new RecordComposerService(config, logging, new LedgerFileService(config, logging), taskSubmitter);
    });

    afterEach(async () => {
        delete process.env.RECORD_DIRECTORY;
        await fs.promises.rm(workDir, { recursive: true, force: true });
    });

    it('creates timestamped batch files in the record directory', () => {
        const batchFile = composer.createBatchFile(new Date(2024, 4, 6, 7, 8, 9, 12));

        expect(batchFile).toBe(path.join(workDir, 'records', 'repair_batch_20240506_070809_012.txt'));
        expect(fs.existsSync(path.join(workDir, 'records'))).toBe(true);
    });

    it('saves verified drafts and skips the rest', async () => {
        const skipped = await composer.appendRecord(undefined, DRAFT, 'B1');
        expect(skipped).toEqual({ saved: false, verification: 'fail' });

        const batchFile = path.join(workDir, 'records', 'batch.txt');
        const first = await composer.appendRecord(batchFile, DRAFT, 'B1, B2');
        await composer.appendRecord(batchFile, { ...DRAFT, productFID: 'P101' }, 'B1, B2');

        expect(first).toEqual({ saved: true, verification: 'pass', batchFile, line: composeLine(DRAFT) });
        const lines = (await fs.promises.readFile(batchFile, 'utf8')).split('\n');
        expect(lines.map(line => line.split(',')[0])).toEqual(['P100', 'P101', '']);

        await expect(composer.removeRecord(batchFile, 'P100')).resolves.toBe(1);
        expect((await fs.promises.readFile(batchFile, 'utf8')).startsWith('P101, ')).toBe(true);
    });

    it('returns catalog presets with their failure kinds', () => {
        const preset = composer.applyPreset('0');

        expect(preset).toMatchObject({
            failureCausedType: '0',
            type: 'General no defect',
            failureKind: 'no fault detected',
            fcode: 'F000',
            remarks: 'NA',
            componentLocation: 'NA',
            repairComponentA5E: 'NA',
        });
        expect(preset.failureKinds).toContain('no fault detected');
        expect(composer.applyPreset('4').fcode).toBe('X009');
    });

    it('reads serials from the configured text source', async () => {
        await expect(composer.captureSerials()).resolves.toBeUndefined();

        composer.useTextSource({ readText: async () => '  B1, B2 \n' });

        await expect(composer.captureSerials()).resolves.toBe('B1, B2');
    });

    it('submits existing batch files as normal tasks', async () => {
        const batchFile = path.join(workDir, 'batch.txt');
        await fs.promises.writeFile(batchFile, `${composeLine(DRAFT)}\n`, 'utf8');

        await expect(composer.submitBatch(batchFile)).resolves.toBe('task0001');
        expect(submitter.startTask).toHaveBeenCalledWith(batchFile, false);
        await expect(composer.submitBatch(path.join(workDir, 'none.txt'))).rejects.toBeInstanceOf(BatchFileNotFoundError);
    });
});
