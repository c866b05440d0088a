// src/config/schemas.ts
import { z } from 'zod';
import { LevelWithSilent } from 'pino';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a comma-separated string from an environment variable into an array of trimmed strings.
 * @param {string} key - The environment variable key (for logging/error messages).
 */
export const parseCommaSeparatedString = (key: string): (val: string | undefined) => string[] => (val: string | undefined): string[] => {
    if (!val) {
        console.warn(`[ConfigService] WARN: Environment variable '${key}' is not set or empty. Returning empty array.`);
        return [];
    }
    return val.split(',').map(item => item.trim()).filter(item => item !== '');
};

const LOG_LEVELS: [LevelWithSilent, ...LevelWithSilent[]] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- General Server Configuration ---
    /**
     * Port on which the server will listen.
     * @default 3001
     */
    PORT: z.coerce.number().int().positive().default(3001),
    /**
     * Comma-separated origins allowed by CORS. Empty means every origin.
     */
    CORS_ALLOWED_ORIGINS: z.string().optional().transform(parseCommaSeparatedString('CORS_ALLOWED_ORIGINS')),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    /**
     * Directory where log files will be stored.
     * @default './logs'
     */
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().min(1).default('app.log'),
    PIPELINE_LOG_FILE_NAME: z.string().min(1).default('pipeline.log'),
    /**
     * Mirror logs to stdout (pretty-printed outside production).
     * @default false
     */
    LOG_TO_CONSOLE: z.enum(['true', 'false']).transform(val => val === 'true').default('false'),

    // --- Dataset Configuration ---
    /**
     * Working directory holding the downloaded/extracted CSV files.
     * @default './data'
     */
    DATA_DIR: z.string().min(1).default('./data'),
    /**
     * Where the dataset is downloaded from when DATA_DIR holds no CSV file.
     * The payload may be a zip archive or a single CSV file.
     */
    DATASET_URL: z.string().url().default('https://data-flair.training/blogs/download-covid-19-dataset/'),
    DATASET_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    /**
     * File name used when the downloaded payload is a bare CSV rather than an archive.
     */
    DATASET_FALLBACK_FILE_NAME: z.string().regex(/\.csv$/i, 'DATASET_FALLBACK_FILE_NAME must end with .csv').default('covid_19_data.csv'),

    // --- View Limits ---
    TOP_N_DEFAULT: z.coerce.number().int().positive().default(10),
    SUMMARY_COUNTRY_LIMIT: z.coerce.number().int().positive().default(50),
    /**
     * Upper bound on markers returned to the map view.
     * @default 5000
     */
    MAP_POINT_LIMIT: z.coerce.number().int().positive().default(5000),
});
