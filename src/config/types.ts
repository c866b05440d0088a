// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * Fully parsed and validated environment configuration.
 */
export type AppConfig = z.infer<typeof envSchema>;

/**
 * Dataset-related settings consumed by the ingestion pipeline.
 */
export interface DatasetConfigStruct {
    /** Absolute path of the working directory holding the CSV corpus. */
    dataDir: string;
    datasetUrl: string;
    fetchTimeoutMs: number;
    fallbackFileName: string;
    /** Extension (lower-case, with dot) that marks a file as tabular. */
    tabularExtension: string;
    topNDefault: number;
    summaryCountryLimit: number;
    mapPointLimit: number;
}
