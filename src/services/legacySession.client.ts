// src/services/legacySession.client.ts
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { Logger } from 'pino';
import { z } from 'zod';
import { LegacySystemConfigStruct } from '../config/types';
import {
    AuthenticationResult,
    LegacyConnectionError,
    ProcessRecordOutcome,
    RecordUploader,
    SearchHit,
    SubmissionForm,
} from '../types/legacySystem.types';
import { RepairData } from '../types/upload.types';
import { BoundedCache } from '../utils/upload/boundedCache';
import { buildSubmission, extractHiddenFields } from '../utils/upload/repairForm';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export const PRODUCT_NOT_FOUND_ERROR = '未查找到产品FID';
export const EDIT_PAGE_UNAVAILABLE_ERROR = '无法访问编辑页面';
export const SUBMIT_FAILED_ERROR = '提交失败';

const LOGIN_STATUS_REGEX = /loginStatus:(\d+),DefaultPage/g;

const CONNECT_TIMEOUT_CODES = new Set(['ETIMEDOUT']);
const CONNECTION_REFUSED_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'ECONNRESET', 'EAI_AGAIN']);
const RESPONSE_TIMEOUT_CODES = new Set(['ECONNABORTED']);

const searchRowSchema = z.object({
    SerialNo: z.unknown().optional(),
    RequestID: z.union([z.string(), z.number()]).optional(),
    uRequestID: z.union([z.string(), z.number()]).optional(),
});

const searchResponseSchema = z.object({
    records: z.coerce.number().optional(),
    rows: z.array(searchRowSchema).optional(),
});

export interface LegacySessionClientOptions {
    /** Replaces the HTTP transport; tests pass an in-process adapter. */
    adapter?: AxiosAdapter;
}

/**
 * One authenticated session against the legacy repair application.
 * Holds its own cookies and caches; one instance serves exactly one upload task.
 */
export class LegacySessionClient implements RecordUploader {
    private readonly http: AxiosInstance;
    private readonly cookies = new Map<string, string>();
    private readonly searchCache: BoundedCache<SearchHit>;
    private readonly pageCache: BoundedCache<string>;
    private readonly logger: Logger;

    private authenticated = false;
    private requestID?: string;
    private uRequestID?: string;

    constructor(
        private readonly config: LegacySystemConfigStruct,
        parentLogger: Logger,
        options: LegacySessionClientOptions = {},
    ) {
        this.logger = parentLogger.child({ service: 'LegacySessionClient' });
        this.http = axios.create({
            headers: config.defaultHeaders,
            responseType: 'text',
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
        this.searchCache = new BoundedCache<SearchHit>(config.cacheSize);
        this.pageCache = new BoundedCache<string>(config.cacheSize);
    }

    private getMethodLogger(methodName: string, additionalContext?: object): Logger {
        return this.logger.child({ serviceMethod: `LegacySessionClient.${methodName}`, ...additionalContext });
    }

    public get isAuthenticated(): boolean {
        return this.authenticated;
    }

    /** Identifiers of the record currently being processed. */
    public get currentRequest(): { requestID?: string; uRequestID?: string } {
        return { requestID: this.requestID, uRequestID: this.uRequestID };
    }

    // --- Cookie handling ---

    private storeCookies(response: AxiosResponse): void {
        const raw: unknown = response.headers['set-cookie'];
        const headerValues = Array.isArray(raw) ? raw : typeof raw === 'string' ? [raw] : [];
        for (const header of headerValues) {
            if (typeof header !== 'string') continue;
            const [pair] = header.split(';');
            const separator = pair.indexOf('=');
            if (separator <= 0) continue;
            this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
        }
    }

    private cookieHeader(): Record<string, string> {
        if (this.cookies.size === 0) {
            return {};
        }
        const value = Array.from(this.cookies.entries()).map(([name, val]) => `${name}=${val}`).join('; ');
        return { Cookie: value };
    }

    private async get(url: string, timeout: number): Promise<AxiosResponse<string>> {
        const response = await this.http.get<string>(url, { timeout, headers: this.cookieHeader() });
        this.storeCookies(response);
        return response;
    }

    private async postForm(url: string, form: Record<string, string>, timeout: number, headers: Record<string, string> = {}): Promise<AxiosResponse<string>> {
        const response = await this.http.post<string>(url, new URLSearchParams(form).toString(), {
            timeout,
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                ...headers,
                ...this.cookieHeader(),
            },
        });
        this.storeCookies(response);
        return response;
    }

    private static bodyOf(response: AxiosResponse<unknown>): string {
        return typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
    }

    // --- Authenticate ---

    /**
     * Landing page, credential POST, then the protected repair page. Any failing step aborts.
     */
    public async authenticate(): Promise<AuthenticationResult> {
        const logger = this.getMethodLogger('authenticate');
        const { endpoints, timeouts, credentials } = this.config;
        this.authenticated = false;

        try {
            const landing = await this.get(endpoints.landingUrl, timeouts.connectivity);
            if (landing.status !== 200) {
                throw new LegacyConnectionError(`Landing page request failed (HTTP ${landing.status})`);
            }

            const login = await this.postForm(endpoints.loginUrl, {
                loginname: credentials.loginName,
                loginpwd: credentials.password,
                stype: 'login',
            }, timeouts.connectivity);
            if (login.status !== 200) {
                throw new LegacyConnectionError(`Login request failed (HTTP ${login.status})`);
            }

            const statuses = Array.from(LegacySessionClient.bodyOf(login).matchAll(LOGIN_STATUS_REGEX), match => match[1]);
            if (!statuses.includes('1')) {
                throw new LegacyConnectionError('Login denied: invalid credentials');
            }

            const system = await this.get(endpoints.protectedPageUrl, timeouts.connectivity);
            if (system.status !== 200) {
                throw new LegacyConnectionError(`Repair system page request failed (HTTP ${system.status})`);
            }

            this.authenticated = true;
            logger.info({ event: 'legacy_auth_success', cookieCount: this.cookies.size }, 'Authenticated against legacy repair system.');
            return { ok: true, message: 'Connected' };
        } catch (error: unknown) {
            const message = LegacySessionClient.describeConnectionError(error);
            logger.warn({ event: 'legacy_auth_failed', err: getErrorMessageAndStack(error) }, message);
            return { ok: false, message };
        }
    }

    /**
     * Distinct messages per failure kind; every one carries a connection keyword.
     */
    static describeConnectionError(error: unknown): string {
        if (error instanceof LegacyConnectionError) {
            return error.message;
        }
        if (axios.isAxiosError(error)) {
            const code = error.code ?? '';
            if (CONNECT_TIMEOUT_CODES.has(code)) {
                return 'Connection timeout: network slow or unstable';
            }
            if (CONNECTION_REFUSED_CODES.has(code)) {
                return 'Connection failed: cannot reach server, check the network';
            }
            if (RESPONSE_TIMEOUT_CODES.has(code)) {
                return 'Request timeout: server did not respond';
            }
            return `Network error: ${error.message}`;
        }
        return `Network error: ${getErrorMessageAndStack(error).message}`;
    }

    // --- Per-record protocol ---

    public async search(productFID: string): Promise<SearchHit | undefined> {
        const cached = this.searchCache.get(productFID);
        if (cached) {
            this.requestID = cached.requestID;
            this.uRequestID = cached.uRequestID;
            return cached;
        }

        const logger = this.getMethodLogger('search', { productFID });
        try {
            const response = await this.postForm(this.config.endpoints.searchUrl, {
                _search: 'true',
                nd: String(Date.now()),
                rows: '5',
                page: '1',
                sidx: 'RequestID',
                sord: 'desc',
                filters: JSON.stringify({
                    groupOp: 'AND',
                    rules: [{ field: 'SerialNo', op: 'eq', data: productFID }],
                }),
            }, this.config.timeouts.search);

            if (response.status !== 200) {
                logger.debug({ event: 'legacy_search_http_error', status: response.status }, 'Search returned non-200.');
                return undefined;
            }

            const parsed = searchResponseSchema.safeParse(JSON.parse(LegacySessionClient.bodyOf(response)));
            if (!parsed.success) {
                logger.debug({ event: 'legacy_search_unexpected_shape', issues: parsed.error.issues.length }, 'Search response did not match the expected shape.');
                return undefined;
            }

            const { records = 0, rows } = parsed.data;
            if (records <= 0 || !rows) {
                return undefined;
            }

            const row = rows.find(candidate => candidate.SerialNo === productFID);
            if (!row || row.RequestID === undefined || row.uRequestID === undefined) {
                return undefined;
            }

            const hit: SearchHit = { requestID: String(row.RequestID), uRequestID: String(row.uRequestID) };
            this.requestID = hit.requestID;
            this.uRequestID = hit.uRequestID;
            this.searchCache.set(productFID, hit);
            return hit;
        } catch (error: unknown) {
            logger.debug({ event: 'legacy_search_failed', err: getErrorMessageAndStack(error) }, 'Search request failed.');
            return undefined;
        }
    }

    public async fetchEditPage(uRequestID: string): Promise<string | undefined> {
        const cacheKey = `edit_${uRequestID}`;
        const cached = this.pageCache.get(cacheKey);
        if (cached !== undefined) {
            return cached;
        }

        const logger = this.getMethodLogger('fetchEditPage', { uRequestID });
        try {
            const url = `${this.config.endpoints.editPageUrl}?sID=${encodeURIComponent(uRequestID)}`;
            const response = await this.get(url, this.config.timeouts.editPage);
            const body = LegacySessionClient.bodyOf(response);
            if (response.status !== 200 || !body.includes(this.config.editPageMarker)) {
                logger.debug({ event: 'legacy_edit_page_rejected', status: response.status }, 'Edit page missing or did not render the form.');
                return undefined;
            }
            this.pageCache.set(cacheKey, body);
            return body;
        } catch (error: unknown) {
            logger.debug({ event: 'legacy_edit_page_failed', err: getErrorMessageAndStack(error) }, 'Edit page request failed.');
            return undefined;
        }
    }

    /** Success is HTTP 200 and nothing else; the endpoint returns no structured confirmation. */
    public async submit(form: SubmissionForm): Promise<boolean> {
        try {
            const response = await this.postForm(this.config.endpoints.submitUrl, form, this.config.timeouts.submit, {
                'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
                'X-Requested-With': 'XMLHttpRequest',
            });
            return response.status === 200;
        } catch (error: unknown) {
            this.getMethodLogger('submit').debug({ event: 'legacy_submit_failed', err: getErrorMessageAndStack(error) }, 'Submit request failed.');
            return false;
        }
    }

    public async processRecord(productFID: string, repairData: RepairData): Promise<ProcessRecordOutcome> {
        try {
            const hit = await this.search(productFID);
            if (!hit) {
                return { success: false, error: PRODUCT_NOT_FOUND_ERROR };
            }

            const page = await this.fetchEditPage(hit.uRequestID);
            if (!page) {
                return { success: false, error: EDIT_PAGE_UNAVAILABLE_ERROR };
            }

            const form = buildSubmission(extractHiddenFields(page), repairData, hit.uRequestID);
            return (await this.submit(form))
                ? { success: true }
                : { success: false, error: SUBMIT_FAILED_ERROR };
        } catch (error: unknown) {
            return { success: false, error: getErrorMessageAndStack(error).message };
        }
    }
}
