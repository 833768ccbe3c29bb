// src/services/uploadWorker.test.ts
import pino from 'pino';
import { UploadWorker, LedgerReader, NOTHING_TO_RETRY_MESSAGE } from './uploadWorker';
import { RecordUploader, ProcessRecordOutcome } from '../types/legacySystem.types';
import { UploadMode, WorkerSummary, RepairData } from '../types/upload.types';
import { parseLedgerLine } from '../utils/upload/ledger.utils';

const line = (fid: string) => `${fid},,,a,b,c,d,e,f,g,h,i,j`;

const memoryLedger = (lines: string[], exists = true): LedgerReader => ({
    exists: async () => exists,
    readLedger: async () => lines.map(parseLedgerLine),
});

function createUploader(
    outcomes: Record<string, ProcessRecordOutcome> = {},
    auth = { ok: true, message: 'Connected' },
) {
    const authenticate = jest.fn(async () => auth);
    const processRecord = jest.fn(async (productFID: string, _data: RepairData): Promise<ProcessRecordOutcome> =>
        outcomes[productFID] ?? { success: true });
    const uploader: RecordUploader = { authenticate, processRecord };
    return { uploader, authenticate, processRecord };
}

function createWorker(ledger: LedgerReader, uploader: RecordUploader, mode: UploadMode = 'normal') {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const worker = new UploadWorker({
        taskId: 'task0001',
        filePath: '/ledgers/batch.txt',
        mode,
        uploader,
        ledger,
        logger: pino({ level: 'silent' }),
        sleep,
    });
    const progress: number[] = [];
    const finished: WorkerSummary[] = [];
    worker.on('progress', percent => progress.push(percent));
    worker.on('finished', summary => finished.push(summary));
    return { worker, sleep, progress, finished };
}

describe('UploadWorker', () => {
    it('uploads every record and reports full success', async () => {
        const { uploader, processRecord } = createUploader();
        const { worker, sleep, progress, finished } = createWorker(memoryLedger([line('X1'), line('X2'), line('X3')]), uploader);

        const summary = await worker.run();

        expect(summary?.outcome).toBe('success');
        expect(summary?.success).toBe(true);
        expect(summary?.results.map(r => r.success)).toEqual([true, true, true]);
        expect(summary?.message.startsWith('🎉 全部成功！3条记录')).toBe(true);
        expect(processRecord).toHaveBeenCalledTimes(3);
        expect(processRecord.mock.calls[0][1]).toEqual({
            failureCausedType: 'a', repairResult: 'b', remarks: 'c', componentLocation: 'd', repairComponentA5E: 'e',
            type: 'f', failureKind: 'g', fcode: 'h', repairAction: 'i', engineer: 'j',
        });
        expect(sleep.mock.calls.map(call => call[0])).toEqual([50, 50]);
        expect(progress).toEqual([10, 20, 30, 50, 70, 90, 100]);
        expect(finished).toHaveLength(1);
    });

    it('fails every record with one category when authentication fails', async () => {
        const { uploader, processRecord } = createUploader({}, { ok: false, message: 'Login denied: invalid credentials' });
        const { worker } = createWorker(memoryLedger([line('X1'), ',,,,']), uploader);

        const summary = await worker.run();

        expect(processRecord).not.toHaveBeenCalled();
        expect(summary?.outcome).toBe('failure');
        expect(summary?.results).toEqual([
            { originalLine: line('X1'), success: false, errorCategory: '连接失败', productFID: 'X1' },
            { originalLine: ',,,,', success: false, errorCategory: '连接失败', productFID: '记录2' },
        ]);
        expect(summary?.message).toBe('连接失败: 连接失败\n❌ 失败：2条记录');
    });

    it('reports short lines as format errors without a remote call', async () => {
        const { uploader, processRecord } = createUploader();
        const { worker } = createWorker(memoryLedger(['P0,b,c,d,e,f,g,h,i,j', line('X1')]), uploader);

        const summary = await worker.run();

        expect(processRecord).toHaveBeenCalledTimes(1);
        expect(processRecord.mock.calls[0][0]).toBe('X1');
        expect(summary?.results).toEqual([
            { originalLine: 'P0,b,c,d,e,f,g,h,i,j', success: false, errorCategory: '数据格式错误', productFID: 'P0' },
            { originalLine: line('X1'), success: true, productFID: 'X1' },
        ]);
        expect(summary?.outcome).toBe('partial');
        expect(summary?.success).toBe(true);
    });

    it('classifies per-record failures and thrown errors', async () => {
        const { uploader, processRecord } = createUploader({ X1: { success: false, error: '未查找到产品FID' } });
        processRecord.mockImplementationOnce(async () => ({ success: false, error: '未查找到产品FID' }));
        processRecord.mockImplementationOnce(async () => {
            throw new Error('socket hang up');
        });
        const { worker, sleep } = createWorker(memoryLedger([line('X1'), line('X2')]), uploader);

        const summary = await worker.run();

        expect(summary?.results.map(r => r.errorCategory)).toEqual(['未查找到产品FID', 'socket hang up']);
        expect(summary?.outcome).toBe('failure');
        expect(summary?.message).toBe('❌ 全部失败！2条记录');
        expect(sleep.mock.calls.map(call => call[0])).toEqual([150]);
    });

    it('processes only non-success lines in retry mode', async () => {
        const { uploader, processRecord } = createUploader();
        const ledger = memoryLedger([`${line('X1')} // success`, `${line('X2')} // 未查找到产品FID`]);
        const { worker } = createWorker(ledger, uploader, 'retry');

        const summary = await worker.run();

        expect(processRecord).toHaveBeenCalledTimes(1);
        expect(processRecord.mock.calls[0][0]).toBe('X2');
        expect(summary?.results).toEqual([{ originalLine: line('X2'), success: true, productFID: 'X2' }]);
        expect(summary?.message.startsWith('🔄 重试结果: 🎉 全部成功！1条记录')).toBe(true);
        expect(summary?.ledgerLines).toHaveLength(2);
    });

    it('finishes successfully when a retry has nothing left', async () => {
        const { uploader, authenticate } = createUploader();
        const { worker } = createWorker(memoryLedger([`${line('X1')} // success`]), uploader, 'retry');

        const summary = await worker.run();

        expect(authenticate).not.toHaveBeenCalled();
        expect(summary?.outcome).toBe('success');
        expect(summary?.message).toBe(NOTHING_TO_RETRY_MESSAGE);
        expect(summary?.results).toEqual([]);
    });

    it('fails on a missing or empty file', async () => {
        const missing = createWorker(memoryLedger([], false), createUploader().uploader);
        const empty = createWorker(memoryLedger([]), createUploader().uploader);

        await expect(missing.worker.run()).resolves.toMatchObject({ outcome: 'failure', message: '文件不存在: /ledgers/batch.txt', results: [] });
        await expect(empty.worker.run()).resolves.toMatchObject({ outcome: 'failure', message: '文件为空', results: [] });
    });

    it('stops emitting after cancellation', async () => {
        const { uploader, processRecord } = createUploader();
        const { worker, finished, progress } = createWorker(memoryLedger([line('X1'), line('X2')]), uploader);
        processRecord.mockImplementationOnce(async () => {
            worker.cancel();
            return { success: true };
        });

        const summary = await worker.run();

        expect(summary).toBeUndefined();
        expect(finished).toHaveLength(0);
        expect(processRecord).toHaveBeenCalledTimes(1);
        expect(progress).toEqual([10, 20, 30]);
        expect(worker.isCancelled).toBe(true);
    });

    it('resolves waitForCompletion once a started run ends', async () => {
        const { uploader } = createUploader();
        const { worker, finished } = createWorker(memoryLedger([line('X1')]), uploader);

        worker.start();

        await expect(worker.waitForCompletion(1000)).resolves.toBe(true);
        expect(worker.isRunning).toBe(false);
        expect(finished).toHaveLength(1);
    });
});
