// src/api/v1/records/records.controller.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { z } from 'zod';

import { LoggingService } from '../../../services/logging.service';
import { RecordComposerService, verifyBoardSerials } from '../../../services/recordComposer.service';
import { RecordNotFoundError } from '../../../types/legacySystem.types';
import { FAILURE_CAUSED_TYPES, failureCatalog } from '../../../utils/upload/failureCatalog';
import { parseRequest } from '../validation';

// Ledger lines are comma separated, so no field may contain one
const ledgerField = z.string().trim().refine(value => !value.includes(','), 'must not contain a comma');

const failureCausedTypeSchema = z.enum(['0', '1', '2', '3', '4']);

export const repairDraftSchema = z.object({
    productFID: ledgerField.pipe(z.string().min(1, 'productFID is required')),
    boardFIDs: z.array(ledgerField).max(3),
    failureCausedType: failureCausedTypeSchema,
    failureCausedTypeText: ledgerField.optional(),
    repairResult: ledgerField,
    remarks: ledgerField,
    componentLocation: ledgerField,
    repairComponentA5E: ledgerField,
    type: ledgerField,
    failureKind: ledgerField,
    fcode: ledgerField.optional(),
    repairAction: ledgerField,
    engineer: ledgerField,
});

export const appendRecordSchema = z.object({
    batchFile: z.string().trim().min(1).optional(),
    draft: repairDraftSchema,
    snrText: z.string().optional(),
});

const verifySchema = z.object({
    boardFIDs: z.array(z.string()),
    snrText: z.string().optional(),
});

const batchFileSchema = z.object({
    batchFile: z.string().trim().min(1, 'batchFile is required'),
});

const getControllerLogger = (routeName: string) =>
    container.resolve(LoggingService).getLogger('app', { controller: 'RecordsController', route: routeName });

/** GET /records/catalog */
export const handleGetCatalog = (req: Request, res: Response): void => {
    res.status(200).json({ failureCausedTypes: FAILURE_CAUSED_TYPES, ...failureCatalog });
};

/** GET /records/presets/:failureCausedType */
export const handleGetPreset = (req: Request, res: Response, next: NextFunction): void => {
    try {
        const { failureCausedType } = parseRequest(z.object({ failureCausedType: failureCausedTypeSchema }), req.params);
        res.status(200).json(container.resolve(RecordComposerService).applyPreset(failureCausedType));
    } catch (error: unknown) {
        next(error);
    }
};

/** POST /records */
export const handleAppendRecord = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger('handleAppendRecord');
    try {
        const { batchFile, draft, snrText } = parseRequest(appendRecordSchema, req.body);
        const outcome = await container.resolve(RecordComposerService).appendRecord(batchFile, draft, snrText);
        logger.debug({ event: 'append_record_handled', productFID: draft.productFID, saved: outcome.saved });
        res.status(outcome.saved ? 201 : 200).json(outcome);
    } catch (error: unknown) {
        next(error);
    }
};

/** POST /records/verify */
export const handleVerifySerials = (req: Request, res: Response, next: NextFunction): void => {
    try {
        const { boardFIDs, snrText } = parseRequest(verifySchema, req.body);
        res.status(200).json({ verification: verifyBoardSerials(boardFIDs, snrText) });
    } catch (error: unknown) {
        next(error);
    }
};

/** DELETE /records/:productFID?batchFile= */
export const handleRemoveRecord = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
        const { batchFile } = parseRequest(batchFileSchema, req.query);
        const { productFID } = parseRequest(z.object({ productFID: z.string().trim().min(1) }), req.params);
        const removedCount = await container.resolve(RecordComposerService).removeRecord(batchFile, productFID);
        if (removedCount === 0) {
            throw new RecordNotFoundError(productFID, batchFile);
        }
        res.status(200).json({ productFID, removedCount });
    } catch (error: unknown) {
        next(error);
    }
};

/** POST /records/submit */
export const handleSubmitBatch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger('handleSubmitBatch');
    try {
        const { batchFile } = parseRequest(batchFileSchema, req.body);
        const taskId = await container.resolve(RecordComposerService).submitBatch(batchFile);
        logger.info({ event: 'batch_submit_accepted', batchFile, taskId });
        res.status(202).json({ taskId });
    } catch (error: unknown) {
        next(error);
    }
};
