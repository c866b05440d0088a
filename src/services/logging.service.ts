// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, LevelWithSilent, stdTimeFunctions, StreamEntry, DestinationStream } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string;[key: string]: unknown };
export type LoggerType = 'app' | 'pipeline';

interface SharedLoggerEntry {
    logger: Logger;
    stream?: DestinationStream & { flushSync?: () => void; end?: () => void };
    filePath: string;
}

@singleton()
export class LoggingService {
    private sharedLoggers: Map<LoggerType, SharedLoggerEntry> = new Map();
    private fallbackLogger?: Logger;

    private readonly logLevel: LevelWithSilent;
    private isShuttingDown = false;
    private isInitialized = false;

    constructor(@inject(ConfigService) private configService: ConfigService) {
        this.logLevel = this.configService.logLevel;
    }

    public async initialize(): Promise<void> {
        if (this.isInitialized) {
            console.warn('[LoggingService:Initialize] Loggers already initialized.');
            return;
        }

        this.ensureDirectory(this.configService.logsDirectory, 'Main Logs Directory');
        this.ensureDirectory(path.dirname(this.configService.appLogFilePath), 'App Log Directory');
        this.ensureDirectory(path.dirname(this.configService.pipelineLogFilePath), 'Pipeline Log Directory');

        const pinoBaseOptions: LoggerOptions = {
            level: this.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined, // no pid/hostname
        };

        try {
            this.sharedLoggers.set('app', this.createSharedLogger('app', this.configService.appLogFilePath, pinoBaseOptions));
            this.sharedLoggers.set('pipeline', this.createSharedLogger('pipeline', this.configService.pipelineLogFilePath, pinoBaseOptions));

            this.isInitialized = true;
            this.getLogger('app').info({ service: 'LoggingService' }, 'Shared loggers initialized.');
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            console.error(`[LoggingService:Initialize] CRITICAL: Failed to initialize shared loggers: ${message}. Stack: ${stack}.`);
            throw error;
        }
    }

    private ensureDirectory(dirPath: string, logTypeDesc: string): void {
        try {
            if (!fs.existsSync(dirPath)) {
                fs.mkdirSync(dirPath, { recursive: true });
            }
            fs.accessSync(dirPath, fs.constants.W_OK);
        } catch (err: unknown) {
            const { message: errorMessage } = getErrorMessageAndStack(err);
            const errorMsg = `CRITICAL: Error ensuring ${logTypeDesc} directory "${dirPath}" exists or is writable: "${errorMessage}".`;
            console.error(`[LoggingService:EnsureDir] ${errorMsg}`);
            throw new Error(errorMsg);
        }
    }

    private createSharedLogger(loggerType: LoggerType, logFilePath: string, basePinoOptions: LoggerOptions): SharedLoggerEntry {
        const streams: StreamEntry[] = [];

        if (this.configService.logToConsole) {
            if (!this.configService.isProduction) {
                streams.push({
                    level: 'trace',
                    stream: pretty({
                        colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname',
                    }),
                });
            } else {
                streams.push({ level: 'trace', stream: process.stdout });
            }
        }

        let fileStream: SharedLoggerEntry['stream'];
        try {
            fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
            streams.push({ level: 'trace', stream: fileStream });
        } catch (err) {
            const { message: errMsg } = getErrorMessageAndStack(err);
            console.error(`[LoggingService:CreateSharedLogger] CRITICAL: Failed to create file stream for ${loggerType} at "${logFilePath}". Error: "${errMsg}".`);
        }

        const logger = streams.length > 0
            ? pino(basePinoOptions, pino.multistream(streams))
            : pino({ ...basePinoOptions, name: `${loggerType}EmergencyFallback` });

        return { logger, stream: fileStream, filePath: logFilePath };
    }

    /**
     * Returns the shared logger of the given type, optionally as a child bound to `context`.
     * Before `initialize()` (and during shutdown) a stdout logger at the configured level is used.
     */
    public getLogger(type: LoggerType = 'app', context?: LoggerContext): Logger {
        const entry = this.isInitialized && !this.isShuttingDown ? this.sharedLoggers.get(type) : undefined;
        const target = entry?.logger ?? this.getFallbackLogger();
        return context ? target.child(context) : target;
    }

    private getFallbackLogger(): Logger {
        if (!this.fallbackLogger) {
            this.fallbackLogger = pino({
                level: this.logLevel,
                timestamp: stdTimeFunctions.isoTime,
                formatters: { level: (label) => ({ level: label }) },
                base: undefined,
            });
        }
        return this.fallbackLogger;
    }

    public flushLogsAndClose(): void {
        if (!this.isInitialized || this.isShuttingDown) {
            return;
        }
        this.getLogger('app').info({ service: 'LoggingService', event: 'log_stream_close_start_all' }, 'Closing log streams before exit.');
        this.isShuttingDown = true;

        for (const [type, entry] of this.sharedLoggers) {
            try {
                entry.stream?.flushSync?.();
                entry.stream?.end?.();
            } catch (err) {
                const { message } = getErrorMessageAndStack(err);
                console.error(`[LoggingService:Flush] Error closing ${type} log stream (${entry.filePath}): ${message}`);
            }
        }

        this.sharedLoggers.clear();
        this.isInitialized = false;
        console.log('[LoggingService:Flush] LoggingService shutdown complete.');
    }
}
