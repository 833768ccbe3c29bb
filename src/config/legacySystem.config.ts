// src/config/legacySystem.config.ts
import { singleton } from 'tsyringe';
import { AppConfig, LegacySystemConfigStruct, LegacyEndpointsStruct, LegacyTimeoutsStruct } from './types';

/** Upper bound for both the search cache and the edit-page cache. */
export const LEGACY_CACHE_SIZE = 100;

const LEGACY_TIMEOUTS_MS: LegacyTimeoutsStruct = {
    connectivity: 8000,
    search: 15000,
    editPage: 30000,
    submit: 30000,
};

@singleton()
export class LegacySystemConfig {
    public readonly baseUrl: string;
    public readonly loginName: string;
    public readonly loginPassword: string;

    constructor(private appConfig: AppConfig) {
        this.baseUrl = appConfig.LEGACY_BASE_URL.replace(/\/+$/, '');
        this.loginName = appConfig.LEGACY_LOGIN_NAME;
        this.loginPassword = appConfig.LEGACY_LOGIN_PASSWORD;
    }

    private get endpoints(): LegacyEndpointsStruct {
        return {
            landingUrl: `${this.baseUrl}/`,
            loginUrl: `${this.baseUrl}/InterfaceLibrary/Login/Login.ashx`,
            protectedPageUrl: `${this.baseUrl}/SEWC/Repair/Default.aspx`,
            searchUrl: `${this.baseUrl}/InterfaceLibrary/SEWC/Repair/Default.ashx`,
            editPageUrl: `${this.baseUrl}/SEWC/Repair/RepairOperation.aspx`,
            submitUrl: `${this.baseUrl}/InterfaceLibrary/SEWC/Repair/RepairOperation.ashx`,
        };
    }

    public get config(): LegacySystemConfigStruct {
        return {
            endpoints: this.endpoints,
            timeouts: { ...LEGACY_TIMEOUTS_MS },
            credentials: { loginName: this.loginName, password: this.loginPassword },
            defaultHeaders: {
                'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
                'Accept': 'application/json, text/javascript, */*; q=0.01',
                'Accept-Language': 'en-US,en;q=0.9,zh-CN;q=0.8,zh;q=0.7',
            },
            editPageMarker: 'ctl00$ContentPlaceHolder1$txtRemarks',
            cacheSize: LEGACY_CACHE_SIZE,
        };
    }
}
