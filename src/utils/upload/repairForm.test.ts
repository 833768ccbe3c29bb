// src/utils/upload/repairForm.test.ts
import { extractHiddenFields, buildSubmission, resolveFcode, buildItemsPayload } from './repairForm';
import { RepairData } from '../../types/upload.types';

const EDIT_PAGE = [
    '<form>',
    '<input type="hidden" name="__VIEWSTATE" id="__VIEWSTATE" value="vs-token" />',
    '<input type="hidden" name="__VIEWSTATEGENERATOR" id="__VIEWSTATEGENERATOR" value="gen-1" />',
    '<input type="hidden" name="__EVENTVALIDATION" id="__EVENTVALIDATION" value="ev-token" />',
    '<input name="ctl00$ContentPlaceHolder1$txtRequestID" id="ctl00_ContentPlaceHolder1_txtRequestID" value=" R-100 " />',
    '<input id="ctl00_ContentPlaceHolder1_txtMLFB" value="6ES7 000" />',
    '<input type="checkbox" id="ctl00_ContentPlaceHolder1_chkisRepeat" checked="checked" />',
    '<input type="checkbox" id="ctl00_ContentPlaceHolder1_chkIsGoodWill" />',
    '<textarea id="ctl00_ContentPlaceHolder1_txtTroubleDesc" rows="3">',
    'Display flickers</textarea>',
    '<textarea name="ctl00$ContentPlaceHolder1$txtRemarks" id="ctl00_ContentPlaceHolder1_txtRemarks">old remark</textarea>',
    '<select id="ctl00_ContentPlaceHolder1_cboWarranty"><option value="N">No</option>',
    '<option selected="selected" value="Y">Yes</option></select>',
    '<input id="txtRepairSN" value="SN-9" />',
    '<input type="checkbox" id="chkBios" checked="checked" />',
    '</form>',
].join('\n');

const REPAIR_DATA: RepairData = {
    failureCausedType: '1',
    repairResult: 'Repaired',
    remarks: 'new remark',
    componentLocation: 'C12',
    repairComponentA5E: 'A5E123',
    type: 'General component or process',
    failureKind: 'capacitor faulty',
    fcode: '',
    repairAction: 'Replace',
    engineer: 'Engineer A',
};

describe('extractHiddenFields', () => {
    const fields = extractHiddenFields(EDIT_PAGE);

    it('reads state tokens and text inputs', () => {
        expect(fields.__VIEWSTATE).toBe('vs-token');
        expect(fields.__VIEWSTATEGENERATOR).toBe('gen-1');
        expect(fields.__EVENTVALIDATION).toBe('ev-token');
        expect(fields.txtRequestID).toBe('R-100');
        expect(fields.txtMLFB).toBe('6ES7 000');
        expect(fields.txtRepairSN).toBe('SN-9');
    });

    it('reads textareas across stripped newlines', () => {
        expect(fields.txtTroubleDesc).toBe('Display flickers');
        expect(fields.txtRemarks).toBe('old remark');
    });

    it('reads the selected option of a select', () => {
        expect(fields.cboWarranty).toBe('Y');
    });

    it('reports checkbox presence', () => {
        expect(fields.chkisRepeat).toBe(true);
        expect(fields.chkIsGoodWill).toBe(false);
        expect(fields.chkBios).toBe(true);
        expect(fields.chkUpdateSerialNo).toBe(false);
    });

    it('defaults missing fields instead of failing', () => {
        expect(fields.txtGoodWillNo).toBe('');
        expect(extractHiddenFields('')).toMatchObject({ __VIEWSTATE: '', chkBios: false });
    });
});

describe('resolveFcode', () => {
    it('looks up known kinds and defaults to F111', () => {
        expect(resolveFcode('capacitor faulty')).toBe('F370');
        expect(resolveFcode('transport damage')).toBe('X009');
        expect(resolveFcode('something new')).toBe('F111');
    });
});

describe('buildSubmission', () => {
    const form = buildSubmission(extractHiddenFields(EDIT_PAGE), REPAIR_DATA, 'u-42');

    it('carries constants and state tokens', () => {
        expect(form.isSubmit).toBe('1');
        expect(form.OperationType).toBe('save');
        expect(form.__VIEWSTATE).toBe('vs-token');
        expect(form.uRequestID).toBe('u-42');
        expect(form.RequestID).toBe('R-100');
    });

    it('lets repair data override scraped values', () => {
        expect(form.Remarks).toBe('new remark');
        expect(form.Warranty).toBe('Y');
        expect(form.TroubleDesc).toBe('Display flickers');
    });

    it('derives the fcode from the failure kind when none is given', () => {
        expect(form.FCode).toBe('F370');
        expect(buildSubmission({}, { ...REPAIR_DATA, fcode: 'F999' }, 'u').FCode).toBe('F999');
    });

    it('serializes booleans as 1/0', () => {
        expect(form.isRepeat).toBe('1');
        expect(form.IsGoodWill).toBe('0');
        expect(form.Bios).toBe('1');
    });

    it('builds the positional Items payload', () => {
        expect(form.Items).toBe('[$$$C12$$$A5E123$$$General component or process$$$capacitor faulty$$$F370$$$Replace$$$$$$0$$$$$$$$$$$$$$$0]');
    });
});

describe('buildItemsPayload', () => {
    it('has 14 slots', () => {
        const payload = buildItemsPayload({
            componentLocation: 'L', repairComponentA5E: 'A', type: 'T', failureKind: 'K', fcode: 'F', repairAction: 'R',
        });
        expect(payload.slice(1, -1).split('$$$')).toEqual(['', 'L', 'A', 'T', 'K', 'F', 'R', '', '0', '', '', '', '', '0']);
    });
});
