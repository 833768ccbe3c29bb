// src/utils/upload/failureCatalog.ts
import catalogData from '../../data/failureCatalog.json';
import { FailureCatalog, FailureCausedTypeCode, FailurePreset } from '../../types/upload.types';

export const FAILURE_CAUSED_TYPES: readonly FailureCausedTypeCode[] = ['0', '1', '2', '3', '4'];

export const failureCatalog: FailureCatalog = catalogData;

export function failureKindsFor(causedType: FailureCausedTypeCode): string[] {
    return failureCatalog.failureKindsByCausedType[causedType];
}

export function presetFor(causedType: FailureCausedTypeCode): FailurePreset {
    return failureCatalog.presets[causedType];
}
