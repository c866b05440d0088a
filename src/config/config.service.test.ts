import 'reflect-metadata';
import path from 'path';
import { createTestServices } from '../test/testServices';

describe('ConfigService', () => {
    it('applies defaults and resolves paths', () => {
        const { configService, dataDir, rootDir, cleanup } = createTestServices();
        try {
            expect(configService.nodeEnv).toBe('test');
            expect(configService.isProduction).toBe(false);
            expect(configService.logLevel).toBe('silent');
            expect(configService.corsAllowedOrigins).toEqual(['*']);
            expect(configService.appLogFilePath).toBe(path.join(rootDir, 'logs', 'app', 'app.log'));
            expect(configService.pipelineLogFilePath).toBe(path.join(rootDir, 'logs', 'pipeline', 'pipeline.log'));
            expect(configService.dataset).toEqual({
                dataDir,
                datasetUrl: 'http://dataset.test/covid.zip',
                fetchTimeoutMs: 60000,
                fallbackFileName: 'covid_19_data.csv',
                tabularExtension: '.csv',
                topNDefault: 10,
                summaryCountryLimit: 50,
                mapPointLimit: 5000,
            });
        } finally {
            cleanup();
        }
    });

    it('reads overrides from the environment', () => {
        const { configService, cleanup } = createTestServices({
            PORT: '4000',
            CORS_ALLOWED_ORIGINS: 'http://a.test, http://b.test,',
            TOP_N_DEFAULT: '5',
            DATASET_FETCH_TIMEOUT_MS: '1500',
        });
        try {
            expect(configService.port).toBe(4000);
            expect(configService.corsAllowedOrigins).toEqual(['http://a.test', 'http://b.test']);
            expect(configService.dataset.topNDefault).toBe(5);
            expect(configService.dataset.fetchTimeoutMs).toBe(1500);
        } finally {
            cleanup();
        }
    });

    it('exits the process on invalid configuration', () => {
        const exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit called');
        });
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        try {
            expect(() => createTestServices({ DATASET_FALLBACK_FILE_NAME: 'data.json' })).toThrow('process.exit called');
            expect(exitSpy).toHaveBeenCalledWith(1);
        } finally {
            exitSpy.mockRestore();
            errorSpy.mockRestore();
        }
    });
});
