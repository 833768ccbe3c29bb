// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * Validated environment, as produced by `envSchema`.
 */
export type AppConfig = z.infer<typeof envSchema>;

/**
 * Endpoints of the legacy repair application, all absolute.
 */
export interface LegacyEndpointsStruct {
    landingUrl: string;
    loginUrl: string;
    protectedPageUrl: string;
    searchUrl: string;
    editPageUrl: string;
    submitUrl: string;
}

/**
 * Per-step request timeouts in milliseconds.
 */
export interface LegacyTimeoutsStruct {
    connectivity: number;
    search: number;
    editPage: number;
    submit: number;
}

export interface LegacySystemConfigStruct {
    endpoints: LegacyEndpointsStruct;
    timeouts: LegacyTimeoutsStruct;
    credentials: { loginName: string; password: string };
    defaultHeaders: Record<string, string>;
    /** Field name whose presence proves the edit form rendered. */
    editPageMarker: string;
    cacheSize: number;
}
