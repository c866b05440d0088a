import path from 'path';
import { AppConfig, DatasetConfigStruct } from './types';

const TABULAR_EXTENSION = '.csv';

/**
 * Dataset acquisition settings and the limits applied to served views.
 */
export class DatasetConfiguration {
    public readonly config: DatasetConfigStruct;

    constructor(appConfig: AppConfig) {
        this.config = {
            dataDir: path.resolve(appConfig.DATA_DIR),
            datasetUrl: appConfig.DATASET_URL,
            fetchTimeoutMs: appConfig.DATASET_FETCH_TIMEOUT_MS,
            fallbackFileName: appConfig.DATASET_FALLBACK_FILE_NAME,
            tabularExtension: TABULAR_EXTENSION,
            topNDefault: appConfig.TOP_N_DEFAULT,
            summaryCountryLimit: appConfig.SUMMARY_COUNTRY_LIMIT,
            mapPointLimit: appConfig.MAP_POINT_LIMIT,
        };
    }
}
