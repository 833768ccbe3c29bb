// src/services/ledgerFile.service.test.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LedgerFileService } from './ledgerFile.service';
import { parseLedgerLine } from '../utils/upload/ledger.utils';
import { UploadResult } from '../types/upload.types';
import { BatchFileNotFoundError } from '../types/legacySystem.types';

const line = (fid: string) => `${fid},,,a,b,c,d,e,f,g,h,i,j`;

describe('LedgerFileService', () => {
    let workDir: string;
    let service: LedgerFileService;

    beforeEach(async () => {
        workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
        const config = new ConfigService();
        service = new LedgerFileService(config, new LoggingService(config));
    });

    afterEach(async () => {
        await fs.promises.rm(workDir, { recursive: true, force: true });
    });

    const write = async (name: string, content: string) => {
        const filePath = path.join(workDir, name);
        await fs.promises.writeFile(filePath, content, 'utf8');
        return filePath;
    };

    const read = (filePath: string) => fs.promises.readFile(filePath, 'utf8');

    it('reads trimmed non-blank lines with their status', async () => {
        const filePath = await write('batch.txt', `  ${line('X1')} // success \r\n\r\n${line('X2')}\n`);

        await expect(service.readLedger(filePath)).resolves.toEqual([
            { rawContent: line('X1'), statusSuffix: 'success' },
            { rawContent: line('X2') },
        ]);
        await expect(service.exists(filePath)).resolves.toBe(true);
        await expect(service.exists(path.join(workDir, 'missing.txt'))).resolves.toBe(false);
    });

    it('writes results to a _fail file and removes the original', async () => {
        const filePath = await write('batch.txt', `${line('X1')}\n${line('X2')}\n`);
        const ledger = await service.readLedger(filePath);
        const results: UploadResult[] = [
            { originalLine: line('X1'), success: true, productFID: 'X1' },
            { originalLine: line('X2'), success: false, errorCategory: '未查找到产品FID', productFID: 'X2' },
        ];

        const outcome = await service.writeResults(filePath, ledger, results, 'normal');

        const failPath = path.join(workDir, 'batch_fail.txt');
        expect(outcome).toEqual({ previousPath: filePath, newPath: failPath, hasFailure: true, lineCount: 2 });
        await expect(read(failPath)).resolves.toBe(`${line('X1')} // success\n${line('X2')} // 未查找到产品FID\n`);
        await expect(service.exists(filePath)).resolves.toBe(false);
    });

    it('moves a fully retried ledger from _fail to _done', async () => {
        const filePath = await write('batch_fail.txt', `${line('X1')} // success\n${line('X2')} // 连接失败\n`);
        const ledger = await service.readLedger(filePath);

        const outcome = await service.writeResults(filePath, ledger, [
            { originalLine: line('X2'), success: true, productFID: 'X2' },
        ], 'retry');

        const donePath = path.join(workDir, 'batch_done.txt');
        expect(outcome?.newPath).toBe(donePath);
        expect(outcome?.hasFailure).toBe(false);
        await expect(read(donePath)).resolves.toBe(`${line('X1')} // success\n${line('X2')} // success\n`);
        await expect(service.exists(filePath)).resolves.toBe(false);
    });

    it('leaves the ledger alone when there are no results', async () => {
        const filePath = await write('batch.txt', `${line('X1')}\n`);

        await expect(service.writeResults(filePath, [parseLedgerLine(line('X1'))], [], 'normal')).resolves.toBeUndefined();
        await expect(read(filePath)).resolves.toBe(`${line('X1')}\n`);
    });

    it('deletes only exact product matches', async () => {
        const filePath = await write('batch.txt', `${line('ABC123')}\n${line('ABC1234')} // success\n${line('ABC123')} // 提交失败\n`);

        await expect(service.deleteRecord(filePath, 'ABC123')).resolves.toBe(2);
        await expect(read(filePath)).resolves.toBe(`${line('ABC1234')} // success\n`);
        await expect(service.deleteRecord(filePath, 'ABC12')).resolves.toBe(0);
    });

    it('reports a missing ledger when deleting a record', async () => {
        const missing = path.join(workDir, 'gone.txt');

        const attempt = service.deleteRecord(missing, 'X1');

        await expect(attempt).rejects.toBeInstanceOf(BatchFileNotFoundError);
        await expect(attempt).rejects.toMatchObject({ status: 404 });
        expect(fs.existsSync(missing)).toBe(false);
    });

    it('appends lines and creates missing directories', async () => {
        const filePath = path.join(workDir, 'nested', 'records', 'batch.txt');

        await expect(service.appendLine(filePath, line('X1'))).resolves.toBe(filePath);
        await expect(service.appendLine(filePath, line('X2'))).resolves.toBe(filePath);
        await expect(read(filePath)).resolves.toBe(`${line('X1')}\n${line('X2')}\n`);
    });

    it('falls back to GBK when the UTF-8 append fails', async () => {
        const filePath = path.join(workDir, 'batch.txt');
        const appendSpy = jest.spyOn(fs.promises, 'appendFile').mockRejectedValueOnce(new Error('EIO: write failed'));

        try {
            await expect(service.appendLine(filePath, '中文')).resolves.toBe(filePath);
        } finally {
            appendSpy.mockRestore();
        }

        const bytes = await fs.promises.readFile(filePath);
        expect(Array.from(bytes)).toEqual([0xd6, 0xd0, 0xce, 0xc4, 0x0a]);
    });
});
