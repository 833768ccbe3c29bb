// src/utils/upload/repairForm.ts
import { ExtractedFormFields, SubmissionForm } from '../../types/legacySystem.types';
import { RepairData } from '../../types/upload.types';
import { failureCatalog } from './failureCatalog';

type FieldKind = 'stateToken' | 'input' | 'textarea' | 'select' | 'checkbox' | 'plainInput' | 'plainCheckbox';

interface FormFieldDefinition {
    name: string;
    kind: FieldKind;
}

const CONTENT_ID_PREFIX = 'ctl00_ContentPlaceHolder1_';

/**
 * Controls of the repair edit page that are read back before a submission.
 */
export const REPAIR_FORM_FIELDS: readonly FormFieldDefinition[] = [
    { name: '__VIEWSTATE', kind: 'stateToken' },
    { name: '__VIEWSTATEGENERATOR', kind: 'stateToken' },
    { name: '__EVENTVALIDATION', kind: 'stateToken' },

    { name: 'txtRequestID', kind: 'input' },
    { name: 'txtSEWCNoticificaionNo', kind: 'input' },
    { name: 'txtOrderType', kind: 'input' },
    { name: 'chkisRepeat', kind: 'checkbox' },
    { name: 'txtTroubleDesc', kind: 'textarea' },

    { name: 'cboWorkStationCode', kind: 'select' },
    { name: 'txtMLFB', kind: 'input' },
    { name: 'txtSerialNo', kind: 'input' },
    { name: 'txtQty', kind: 'input' },
    { name: 'txtUpdatedSerialNo', kind: 'input' },
    { name: 'chkUpdateSerialNo', kind: 'checkbox' },
    { name: 'txtVSRNumber', kind: 'input' },

    { name: 'txtFuntinalStateoriginal', kind: 'input' },
    { name: 'txtFuntinalStatelatest', kind: 'input' },
    { name: 'txtFirmwareoriginal', kind: 'input' },
    { name: 'txtFirmwarelatest', kind: 'input' },

    { name: 'cboWarranty', kind: 'select' },
    { name: 'cboServiceType', kind: 'select' },
    { name: 'cboEngineer', kind: 'select' },
    { name: 'cboFailureCasedType', kind: 'select' },
    { name: 'cboRepairResult', kind: 'select' },

    { name: 'dtpConfirmCompleteDate', kind: 'input' },
    { name: 'dtpEndRepairDate', kind: 'input' },
    { name: 'txtLaborCost', kind: 'input' },
    { name: 'chkIsGoodWill', kind: 'checkbox' },
    { name: 'txtGoodWillNo', kind: 'input' },

    { name: 'txtRemarks', kind: 'textarea' },
    { name: 'txtFailureDesc', kind: 'textarea' },

    { name: 'txtPCBA5ENo', kind: 'input' },
    { name: 'txtComponentLocation', kind: 'input' },
    { name: 'txtPCBA_FID', kind: 'input' },
    { name: 'txtRepairedComponentA5E', kind: 'input' },
    { name: 'cboFailureType', kind: 'select' },
    { name: 'txtFCode', kind: 'input' },
    { name: 'cboRepairAction', kind: 'select' },
    { name: 'txtRepairSN', kind: 'plainInput' },
    { name: 'chkBios', kind: 'plainCheckbox' },
];

function patternFor(field: FormFieldDefinition): RegExp {
    const id = `id="${CONTENT_ID_PREFIX}${field.name}"`;
    switch (field.kind) {
        case 'stateToken':
            return new RegExp(`name="${field.name}"[^>]*value="([^"]*)"`);
        case 'input':
            return new RegExp(`${id}[^>]*value="([^"]*)"`);
        case 'textarea':
            return new RegExp(`${id}[^>]*>([^<]*)</textarea>`);
        case 'select':
            return new RegExp(`${id}[^>]*>.*?<option[^>]*selected="selected"[^>]*value="([^"]*)"`);
        case 'checkbox':
            return new RegExp(`${id}[^>]*checked="checked"`);
        case 'plainInput':
            return new RegExp(`id="${field.name}"[^>]*value="([^"]*)"`);
        case 'plainCheckbox':
            return new RegExp(`id="${field.name}"[^>]*checked="checked"`);
    }
}

const isCheckbox = (kind: FieldKind): boolean => kind === 'checkbox' || kind === 'plainCheckbox';

const COMPILED_FIELDS = REPAIR_FORM_FIELDS.map(field => ({ ...field, pattern: patternFor(field) }));

/**
 * Reads every registered field from the raw edit page. Missing text fields become `""`,
 * missing checkboxes `false`.
 */
export function extractHiddenFields(pageText: string): ExtractedFormFields {
    const content = pageText.replace(/[\r\n]/g, '');
    const fields: ExtractedFormFields = {};
    for (const field of COMPILED_FIELDS) {
        const match = field.pattern.exec(content);
        if (isCheckbox(field.kind)) {
            fields[field.name] = match !== null;
        } else {
            fields[field.name] = match?.[1]?.trim() ?? '';
        }
    }
    return fields;
}

/** Fixed failure-kind → fcode table; unknown kinds get `F111`. */
export function resolveFcode(failureKind: string): string {
    return failureCatalog.fcodeByFailureKind[failureKind] ?? failureCatalog.defaultFcode;
}

const ITEMS_DELIMITER = '$$$';

/** Serializes the positional `Items` payload of the repair form. */
export function buildItemsPayload(slots: {
    componentLocation: string;
    repairComponentA5E: string;
    type: string;
    failureKind: string;
    fcode: string;
    repairAction: string;
}): string {
    const items = [
        '',
        slots.componentLocation,
        slots.repairComponentA5E,
        slots.type,
        slots.failureKind,
        slots.fcode,
        slots.repairAction,
        '', '0', '', '', '', '', '0',
    ];
    return `[${items.join(ITEMS_DELIMITER)}]`;
}

const textOf = (fields: ExtractedFormFields, name: string): string => {
    const value = fields[name];
    return typeof value === 'string' ? value : '';
};

const flagOf = (fields: ExtractedFormFields, name: string): string => (fields[name] === true ? '1' : '0');

/**
 * Merges scraped values with new repair data into the form the submit endpoint expects.
 * Values present in `repairData` win over scraped ones.
 */
export function buildSubmission(existing: ExtractedFormFields, repairData: Partial<RepairData>, uRequestID: string): SubmissionForm {
    const failureKind = repairData.failureKind ?? '';
    let fcode = repairData.fcode ?? '';
    if (failureKind && !fcode) {
        fcode = resolveFcode(failureKind);
    }

    const componentLocation = repairData.componentLocation ?? textOf(existing, 'txtComponentLocation');
    const repairComponentA5E = repairData.repairComponentA5E ?? textOf(existing, 'txtRepairedComponentA5E');
    const failureType = repairData.type ?? textOf(existing, 'cboFailureType');
    const repairAction = repairData.repairAction ?? textOf(existing, 'cboRepairAction');

    return {
        isSubmit: '1',
        OperationType: 'save',

        __VIEWSTATE: textOf(existing, '__VIEWSTATE'),
        __VIEWSTATEGENERATOR: textOf(existing, '__VIEWSTATEGENERATOR'),
        __EVENTVALIDATION: textOf(existing, '__EVENTVALIDATION'),

        RequestID: textOf(existing, 'txtRequestID'),
        SEWCNoticificaionNo: textOf(existing, 'txtSEWCNoticificaionNo'),
        OrderType: textOf(existing, 'txtOrderType'),
        isRepeat: flagOf(existing, 'chkisRepeat'),
        TroubleDesc: textOf(existing, 'txtTroubleDesc'),

        WorkStationCode: textOf(existing, 'cboWorkStationCode'),
        MLFB: textOf(existing, 'txtMLFB'),
        SerialNo: textOf(existing, 'txtSerialNo'),
        Qty: textOf(existing, 'txtQty'),
        UpdatedSerialNo: textOf(existing, 'txtUpdatedSerialNo'),
        UpdateSerialNo: flagOf(existing, 'chkUpdateSerialNo'),
        VSRNumber: textOf(existing, 'txtVSRNumber'),

        FuntinalStateoriginal: textOf(existing, 'txtFuntinalStateoriginal'),
        FuntinalStatelatest: textOf(existing, 'txtFuntinalStatelatest'),
        Firmwareoriginal: textOf(existing, 'txtFirmwareoriginal'),
        Firmwarelatest: textOf(existing, 'txtFirmwarelatest'),

        Warranty: textOf(existing, 'cboWarranty'),
        ServiceType: textOf(existing, 'cboServiceType'),
        ConfirmCompleteDate: textOf(existing, 'dtpConfirmCompleteDate'),
        EndRepairDate: textOf(existing, 'dtpEndRepairDate'),
        LaborCost: textOf(existing, 'txtLaborCost'),
        IsGoodWill: flagOf(existing, 'chkIsGoodWill'),
        GoodWillNo: textOf(existing, 'txtGoodWillNo'),

        Items: buildItemsPayload({ componentLocation, repairComponentA5E, type: failureType, failureKind, fcode, repairAction }),
        Remarks: repairData.remarks ?? textOf(existing, 'txtRemarks'),
        FailureDesc: textOf(existing, 'txtFailureDesc'),
        RepairResult: repairData.repairResult ?? textOf(existing, 'cboRepairResult'),
        FailureCasedType: repairData.failureCausedType ?? textOf(existing, 'cboFailureCasedType'),
        Engineer: repairData.engineer ?? textOf(existing, 'cboEngineer'),

        PCBA5ENo: textOf(existing, 'txtPCBA5ENo'),
        ComponentLocation: componentLocation,
        PCBA_FID: textOf(existing, 'txtPCBA_FID'),
        RepairedComponentA5E: repairComponentA5E,
        FailureType: failureType,
        FCode: fcode,
        RepairAction: repairAction,
        RepairSN: textOf(existing, 'txtRepairSN'),
        Bios: flagOf(existing, 'chkBios'),

        uRequestID,
    };
}
