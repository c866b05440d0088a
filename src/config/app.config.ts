import path from 'path';
import { AppConfig } from './types';
import { LevelWithSilent } from 'pino';

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly port: number;
    public readonly corsAllowedOrigins: string[];

    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly pipelineLogFileName: string;
    public readonly logToConsole: boolean;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.port = appConfig.PORT;
        this.corsAllowedOrigins = appConfig.CORS_ALLOWED_ORIGINS.length > 0 ? appConfig.CORS_ALLOWED_ORIGINS : ['*'];

        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME;
        this.pipelineLogFileName = appConfig.PIPELINE_LOG_FILE_NAME;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
    }

    // --- Log directories (inside logsDirectoryPath) ---
    get appLogDirectory(): string {
        return path.join(this.logsDirectoryPath, 'app');
    }
    get pipelineLogDirectory(): string {
        return path.join(this.logsDirectoryPath, 'pipeline');
    }

    get appLogFilePath(): string {
        return path.join(this.appLogDirectory, this.appLogFileName);
    }
    get pipelineLogFilePath(): string {
        return path.join(this.pipelineLogDirectory, this.pipelineLogFileName);
    }
}
