// src/utils/upload/errorClassifier.ts
import { ClassifiedError, ErrorCategory } from '../../types/upload.types';

export const CATEGORY_LABELS: Readonly<Record<Exclude<ErrorCategory, 'Other' | 'FileError'>, string>> = {
    ConnectionFailure: '连接失败',
    ProductNotFound: '未查找到产品FID',
    SubmissionFailure: '提交失败',
    FormatError: '数据格式错误',
};

export const OTHER_LABEL_MAX_LENGTH = 50;

interface ClassificationRule {
    keywords: readonly string[];
    category: ErrorCategory;
    label: string;
}

/**
 * Evaluated top to bottom; the first rule with a keyword contained in the
 * lower-cased message wins.
 */
const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        keywords: ['connection', 'connect', 'timeout', 'network', '连接', 'login', '登录', 'cookie', 'session', 'http'],
        category: 'ConnectionFailure',
        label: CATEGORY_LABELS.ConnectionFailure,
    },
    {
        keywords: ['search', 'not found', 'no result', '搜索', '未找到', 'product', 'fid', 'serial'],
        category: 'ProductNotFound',
        label: CATEGORY_LABELS.ProductNotFound,
    },
    {
        keywords: ['submit', 'post', 'form', 'data', '提交', '数据'],
        category: 'SubmissionFailure',
        label: CATEGORY_LABELS.SubmissionFailure,
    },
];

export function classifyError(rawMessage: string | null | undefined): ClassifiedError {
    if (!rawMessage) {
        return { category: 'SubmissionFailure', label: CATEGORY_LABELS.SubmissionFailure };
    }

    const lowered = rawMessage.toLowerCase();
    for (const rule of CLASSIFICATION_RULES) {
        if (rule.keywords.some(keyword => lowered.includes(keyword))) {
            return { category: rule.category, label: rule.label };
        }
    }

    // Other: keep the message itself, cut to fit a ledger suffix
    return { category: 'Other', label: rawMessage.slice(0, OTHER_LABEL_MAX_LENGTH) };
}

/** Shorthand for the label only. */
export const categorizeError = (rawMessage: string | null | undefined): string => classifyError(rawMessage).label;
