// src/config/config.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LevelWithSilent } from 'pino';

import { envSchema } from './schemas';
import { AppConfig, DatasetConfigStruct } from './types';
import { AppConfiguration } from './app.config';
import { DatasetConfiguration } from './dataset.config';

@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;

    public readonly appConfiguration: AppConfiguration;
    private readonly datasetConfiguration: DatasetConfiguration;

    constructor() {
        dotenv.config();

        try {
            this.rawConfig = envSchema.parse(process.env);
        } catch (error) {
            if (error instanceof z.ZodError) {
                console.error("❌ Invalid environment variables (schema validation failed):", JSON.stringify(error.format(), null, 2));
            } else {
                console.error("❌ Unexpected error loading configuration:", error);
            }
            process.exit(1);
        }

        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.datasetConfiguration = new DatasetConfiguration(this.rawConfig);

        if (this.nodeEnv !== 'test') {
            console.log("✅ Configuration loaded and validated successfully.");
            console.log(`   - NODE_ENV: ${this.nodeEnv}`);
            console.log(`   - Server Port: ${this.port}`);
            console.log(`   - Log Level: ${this.logLevel}`);
            console.log(`   - Logs Directory: ${this.logsDirectory}`);
            console.log(`   - Data Directory: ${this.dataset.dataDir}`);
            console.log(`   - Dataset URL: ${this.dataset.datasetUrl}`);
            console.log(`   - Fetch Timeout (ms): ${this.dataset.fetchTimeoutMs}`);
        }
    }

    get nodeEnv() { return this.appConfiguration.nodeEnv; }

    public get isProduction(): boolean {
        return this.appConfiguration.nodeEnv === 'production';
    }

    get port(): number { return this.appConfiguration.port; }
    get corsAllowedOrigins(): string[] { return this.appConfiguration.corsAllowedOrigins; }

    get logLevel(): LevelWithSilent { return this.appConfiguration.logLevel; }
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get logToConsole(): boolean { return this.appConfiguration.logToConsole; }
    get appLogFilePath(): string { return this.appConfiguration.appLogFilePath; }
    get pipelineLogFilePath(): string { return this.appConfiguration.pipelineLogFilePath; }

    get dataset(): DatasetConfigStruct { return this.datasetConfiguration.config; }
}
