// src/utils/upload/errorClassifier.test.ts
import { classifyError, categorizeError } from './errorClassifier';

describe('classifyError', () => {
    it('maps connection keywords to ConnectionFailure', () => {
        expect(classifyError('Login request timeout after 8000ms')).toEqual({ category: 'ConnectionFailure', label: '连接失败' });
        expect(categorizeError('会话 cookie 无效')).toBe('连接失败');
    });

    it('maps search keywords to ProductNotFound', () => {
        expect(classifyError('未查找到产品FID')).toEqual({ category: 'ProductNotFound', label: '未查找到产品FID' });
        expect(categorizeError('Serial lookup returned no result')).toBe('未查找到产品FID');
    });

    it('maps submission keywords to SubmissionFailure', () => {
        expect(categorizeError('提交失败')).toBe('提交失败');
        expect(categorizeError('Form rejected')).toBe('提交失败');
    });

    it('applies rules in order, connection first', () => {
        // "http" and "search" both present: connection wins
        expect(categorizeError('HTTP 500 from search endpoint')).toBe('连接失败');
        // "product" and "form" both present: not-found wins
        expect(categorizeError('product form missing')).toBe('未查找到产品FID');
    });

    it('defaults empty input to SubmissionFailure', () => {
        expect(classifyError('')).toEqual({ category: 'SubmissionFailure', label: '提交失败' });
        expect(classifyError(undefined).category).toBe('SubmissionFailure');
        expect(classifyError(null).category).toBe('SubmissionFailure');
    });

    it('truncates unknown messages to 50 characters', () => {
        const raw = 'x'.repeat(80);
        const result = classifyError(raw);
        expect(result.category).toBe('Other');
        expect(result.label).toBe('x'.repeat(50));
        expect(classifyError('无法访问编辑页面')).toEqual({ category: 'Other', label: '无法访问编辑页面' });
    });
});
