import { IHttpClient } from '../interfaces/http-interface';

/**
 * Progress information for a running fetch
 */
export type FetchProgress = {
    loaded: number;
    total: number; // 0 when the server sent no content length
}

/**
 * Response details reported alongside a payload or failure
 */
export type ResponseMetadata = {
    status: number;
    statusText: string;
    headers: Record<string, string>;
}

/**
 * Callback an engine invokes once a request settles
 */
export type FetchCompletionHandler = (
    payload: Buffer | null,
    metadata: ResponseMetadata | null,
    failure: Error | null,
) => void;

/**
 * Options for the axios-backed fetch engine
 */
export type FetchEngineOptions = {
    httpClient?: IHttpClient;
    onProgress?: (progress: FetchProgress) => void;
}
