// src/services/datasetFetcher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { AxiosInstance, isAxiosError } from 'axios';
import { unzipSync } from 'fflate';
import { Mutex } from 'async-mutex';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { HTTP_CLIENT } from '../config/constants';
import { LoggingService } from './logging.service';
import { FetchError } from '../errors/dataset.errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { findTabularFiles } from '../utils/dataset/tabularFiles';

// "PK\x03\x04" (local file header) or "PK\x05\x06" (empty archive).
const ZIP_SIGNATURES = [
    Buffer.from([0x50, 0x4b, 0x03, 0x04]),
    Buffer.from([0x50, 0x4b, 0x05, 0x06]),
];

/**
 * Makes sure the working directory holds the CSV corpus, downloading it once when it does not.
 */
@singleton()
export class DatasetFetcherService {
    private readonly serviceLogger: Logger;
    private readonly mutex = new Mutex(); // serializes directory population within the process

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(HTTP_CLIENT) private httpClient: AxiosInstance
    ) {
        this.serviceLogger = this.loggingService.getLogger('pipeline', { service: 'DatasetFetcherService' });
    }

    /**
     * Returns `workingDir` once it contains at least one tabular file.
     * No network call is made when such a file already exists.
     *
     * @throws {FetchError} When the download fails, times out or returns a non-success status.
     */
    public async ensureData(
        workingDir: string = this.configService.dataset.dataDir,
        sourceUrl: string = this.configService.dataset.datasetUrl
    ): Promise<string> {
        const logger = this.serviceLogger.child({ operation: 'ensureData', workingDir });
        await fs.promises.mkdir(workingDir, { recursive: true });

        return this.mutex.runExclusive(async () => {
            const existing = await findTabularFiles(workingDir, this.configService.dataset.tabularExtension);
            if (existing.length > 0) {
                logger.debug({ fileCount: existing.length }, 'Tabular files already present. Skipping download.');
                return workingDir;
            }

            logger.info({ sourceUrl }, 'No tabular files found. Downloading dataset.');
            const payload = await this.download(sourceUrl, logger);
            await this.persistPayload(payload, workingDir, logger);
            return workingDir;
        });
    }

    private async download(sourceUrl: string, logger: Logger): Promise<Buffer> {
        const timeout = this.configService.dataset.fetchTimeoutMs;
        try {
            const response = await this.httpClient.get<ArrayBuffer>(sourceUrl, {
                responseType: 'arraybuffer',
                timeout,
            });
            const payload = Buffer.from(response.data);
            logger.info({ status: response.status, bytes: payload.length }, 'Dataset downloaded.');
            return payload;
        } catch (error: unknown) {
            const status = isAxiosError(error) ? error.response?.status : undefined;
            const { message } = getErrorMessageAndStack(error);
            logger.error({ sourceUrl, status, errorMessage: message, timeoutMs: timeout }, 'Dataset download failed.');
            throw new FetchError(sourceUrl, message, status, { cause: error });
        }
    }

    private async persistPayload(payload: Buffer, workingDir: string, logger: Logger): Promise<void> {
        if (looksLikeZip(payload)) {
            try {
                const written = await this.extractArchive(payload, workingDir, logger);
                logger.info({ filesWritten: written }, 'Archive extracted.');
                return;
            } catch (error: unknown) {
                const { message } = getErrorMessageAndStack(error);
                logger.warn({ errorMessage: message }, 'Payload has a zip signature but is not a readable archive. Saving it as a single file.');
            }
        }

        const target = path.join(workingDir, this.configService.dataset.fallbackFileName);
        await writeFileAtomically(target, payload);
        logger.info({ path: target, bytes: payload.length }, 'Payload saved as a single tabular file.');
    }

    private async extractArchive(payload: Buffer, workingDir: string, logger: Logger): Promise<number> {
        const entries = unzipSync(new Uint8Array(payload));
        const root = path.resolve(workingDir);
        let written = 0;

        for (const [name, data] of Object.entries(entries)) {
            if (name.endsWith('/')) continue; // directory entry

            const target = path.resolve(root, name);
            if (!target.startsWith(root + path.sep)) {
                logger.warn({ entry: name }, 'Archive entry points outside the working directory. Skipped.');
                continue;
            }
            await fs.promises.mkdir(path.dirname(target), { recursive: true });
            await writeFileAtomically(target, data);
            written += 1;
        }
        return written;
    }
}

const looksLikeZip = (payload: Buffer): boolean =>
    ZIP_SIGNATURES.some(signature => payload.subarray(0, signature.length).equals(signature));

/**
 * Writes under a `.part` name first so that file discovery never picks up a half-written file.
 */
const writeFileAtomically = async (target: string, data: Uint8Array): Promise<void> => {
    const partial = `${target}.${process.pid}.part`;
    await fs.promises.writeFile(partial, data);
    await fs.promises.rename(partial, target);
};
