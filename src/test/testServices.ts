// src/test/testServices.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';

export interface TestServices {
    configService: ConfigService;
    loggingService: LoggingService;
    /** Per-test scratch directory; `DATA_DIR` and `LOGS_DIRECTORY` live inside it. */
    rootDir: string;
    dataDir: string;
    cleanup: () => void;
}

/**
 * Builds a ConfigService from a scratch environment and an uninitialized
 * LoggingService (silent fallback logger). `process.env` is restored afterwards.
 */
export const createTestServices = (env: Record<string, string> = {}): TestServices => {
    const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'outbreak-stats-'));
    const dataDir = path.join(rootDir, 'data');
    const scratchEnv: Record<string, string> = {
        DATA_DIR: dataDir,
        LOGS_DIRECTORY: path.join(rootDir, 'logs'),
        DATASET_URL: 'http://dataset.test/covid.zip',
        CORS_ALLOWED_ORIGINS: '*',
        ...env,
    };

    const previous = new Map<string, string | undefined>();
    for (const [key, value] of Object.entries(scratchEnv)) {
        previous.set(key, process.env[key]);
        process.env[key] = value;
    }

    try {
        const configService = new ConfigService();
        const loggingService = new LoggingService(configService);
        return {
            configService,
            loggingService,
            rootDir,
            dataDir,
            cleanup: () => fs.rmSync(rootDir, { recursive: true, force: true }),
        };
    } catch (error: unknown) {
        fs.rmSync(rootDir, { recursive: true, force: true });
        throw error;
    } finally {
        for (const [key, value] of previous) {
            if (value === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = value;
            }
        }
    }
};
