import 'reflect-metadata'; // must stay the first import
import './container';
import http from 'http';
import { container } from 'tsyringe';
import { Logger } from 'pino';
import { initLoaders } from './loaders';
import { LoggingService } from './services/logging.service';
import { ConfigService } from './config/config.service';
import { getErrorMessageAndStack } from './utils/errorUtils';

const SHUTDOWN_TIMEOUT_MS = 15000;

let loggingService: LoggingService | undefined;
let httpServer: http.Server | undefined;
let isShuttingDown = false;

/** Until logging is initialized this is a console logger at the configured level. */
const getLogger = (): Logger => container.resolve(LoggingService).getLogger('app', { service: 'server' });

async function startServer(): Promise<void> {
    try {
        const configService = container.resolve(ConfigService);
        loggingService = container.resolve(LoggingService);

        try {
            await loggingService.initialize();
        } catch (error: unknown) {
            console.error('FATAL: could not initialize logging. Exiting.', error);
            process.exit(1);
        }

        const loaderResult = await initLoaders();
        httpServer = loaderResult.httpServer;

        const port = configService.port;
        httpServer.listen(port, () => {
            getLogger().info({ port, corsAllowedOrigins: configService.corsAllowedOrigins }, `Server ready at http://localhost:${port}`);
        });
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        getLogger().fatal({ errorMessage: message, stack }, 'Fatal error during startup.');
        await gracefulShutdown('Initialization Error', error);
    }
}

async function gracefulShutdown(signal: string, error?: unknown): Promise<void> {
    const logger = getLogger();
    const reason = error ? `error (${getErrorMessageAndStack(error).message})` : `signal (${signal})`;

    if (isShuttingDown) {
        logger.warn({ signal }, `Shutdown already in progress (${reason}). Ignoring.`);
        return;
    }
    isShuttingDown = true;

    let exitCode = error ? 1 : 0;
    logger.info(`Received ${reason}. Shutting down.`);

    const shutdownTimeout = setTimeout(() => {
        logger.error(`Graceful shutdown exceeded ${SHUTDOWN_TIMEOUT_MS}ms. Forcing exit.`);
        process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
        const server = httpServer;
        if (server && server.listening) {
            await new Promise<void>((resolve) => {
                server.close((err) => {
                    if (err) {
                        logger.error({ errorMessage: err.message }, 'Error while closing HTTP server.');
                        exitCode = 1;
                    } else {
                        logger.info('HTTP server closed.');
                    }
                    resolve();
                });
            });
        }
    } finally {
        if (loggingService) {
            await loggingService.flushLogsAndClose();
        }
        clearTimeout(shutdownTimeout);
        console.log(`Shutdown complete. Exiting with code ${exitCode}.`);
        process.exit(exitCode);
    }
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

shutdownSignals.forEach((signal) => {
    process.on(signal, () => {
        void gracefulShutdown(signal);
    });
});

process.on('uncaughtException', (err: Error, origin: string) => {
    getLogger().fatal({ err: { message: err.message, stack: err.stack, name: err.name }, origin }, 'Uncaught exception. Shutting down.');
    if (isShuttingDown) {
        process.exit(1);
    }
    void gracefulShutdown('uncaughtException', err);
});

process.on('unhandledRejection', (reason: unknown) => {
    const { message, stack } = getErrorMessageAndStack(reason);
    getLogger().fatal({ errorMessage: message, stack }, 'Unhandled promise rejection. Shutting down.');
    if (isShuttingDown) {
        process.exit(1);
    }
    void gracefulShutdown('unhandledRejection', reason);
});

void startServer();
