// src/errors/dataset.errors.ts

/**
 * Base class for the fatal pipeline errors. `statusCode` and `isOperational`
 * are read by the Express error handler.
 */
export abstract class DatasetError extends Error {
    public abstract readonly statusCode: number;
    public readonly isOperational = true;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The dataset could not be downloaded: network failure, timeout or a non-2xx status.
 * Never retried.
 */
export class FetchError extends DatasetError {
    public readonly statusCode = 503;

    constructor(
        public readonly url: string,
        message: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(`Failed to fetch dataset from ${url}: ${message}`, options);
    }
}

/**
 * Not a single tabular file in the working directory could be parsed.
 */
export class NoDataError extends DatasetError {
    public readonly statusCode = 503;

    constructor(
        public readonly workingDir: string,
        public readonly filesSeen: number
    ) {
        super(filesSeen === 0
            ? `No CSV files found in data directory "${workingDir}".`
            : `None of the ${filesSeen} CSV file(s) in "${workingDir}" could be parsed.`);
    }
}
