import axios, { AxiosProgressEvent, AxiosResponse } from 'axios';
import { FetchCompletionHandler, FetchEngineOptions, ResponseMetadata } from '../models/fetch';
import { IHttpClient, AxiosHttpClient } from './http-interface';

/**
 * Network fetch abstraction interface for testability.
 *
 * Implementations must invoke `completionHandler` exactly once per request.
 */
export interface FetchEngine {
    performRequest(url: URL, completionHandler: FetchCompletionHandler): void;
}

function toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (value === null || value === undefined) {
            continue;
        }
        record[name] = Array.isArray(value) ? value.join(', ') : String(value);
    }
    return record;
}

function toMetadata(response: AxiosResponse): ResponseMetadata {
    return {
        status: response.status,
        statusText: response.statusText,
        headers: toHeaderRecord(response.headers),
    };
}

/**
 * Default implementation using axios through IHttpClient
 */
export class AxiosFetchEngine implements FetchEngine {
    private readonly httpClient: IHttpClient;
    private readonly onProgress?: FetchEngineOptions['onProgress'];

    constructor(options: FetchEngineOptions = {}) {
        this.httpClient = options.httpClient ?? new AxiosHttpClient();
        this.onProgress = options.onProgress;
    }

    performRequest(url: URL, completionHandler: FetchCompletionHandler): void {
        // The handler runs outside the promise chain so its exceptions are not turned into rejections.
        void this.fetch(url).then(
            ({ payload, metadata }) => process.nextTick(completionHandler, payload, metadata, null),
            (error: unknown) => {
                const metadata = axios.isAxiosError(error) && error.response ? toMetadata(error.response) : null;
                const failure = error instanceof Error ? error : new Error(String(error));
                process.nextTick(completionHandler, null, metadata, failure);
            },
        );
    }

    private async fetch(url: URL): Promise<{ payload: Buffer; metadata: ResponseMetadata }> {
        const onProgress = this.onProgress;
        const response = await this.httpClient.request<ArrayBuffer>({
            method: 'GET',
            url: url.href,
            responseType: 'arraybuffer',
            onDownloadProgress: onProgress
                ? (event: AxiosProgressEvent) => onProgress({ loaded: event.loaded, total: event.total ?? 0 })
                : undefined,
        });

        return {
            payload: Buffer.from(response.data),
            metadata: toMetadata(response),
        };
    }
}

let sharedEngine: FetchEngine | undefined;

/**
 * Returns the process-wide engine, creating it on first use
 */
export function sharedFetchEngine(): FetchEngine {
    if (!sharedEngine) {
        sharedEngine = new AxiosFetchEngine();
    }
    return sharedEngine;
}
