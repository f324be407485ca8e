import { FetchEngine, sharedFetchEngine } from './interfaces/fetch-engine-interface';
import { LoadResult } from './models/result';

export interface ILoader {
    load(url: URL, completionHandler: (result: LoadResult) => void): void;
    loadAsync(url: URL): Promise<LoadResult>;
}

/**
 * Fetches a single resource through a FetchEngine and reports it as a LoadResult.
 *
 * Pass an engine to substitute the transport (tests use a mock engine);
 * without one the process-wide shared engine is used.
 */
export class Loader implements ILoader {
    constructor(readonly engine: FetchEngine = sharedFetchEngine()) {}

    /**
     * Invokes `completionHandler` once, on whatever context the engine calls back on.
     * A failure takes priority over any payload the engine also delivered.
     */
    load(url: URL, completionHandler: (result: LoadResult) => void): void {
        let delivered = false;

        this.engine.performRequest(url, (payload, _metadata, failure) => {
            if (delivered) {
                console.warn(`Ignoring repeated completion for ${url.href}`);
                return;
            }
            delivered = true;

            if (failure) {
                completionHandler(LoadResult.error(failure));
                return;
            }
            completionHandler(LoadResult.data(payload ?? Buffer.alloc(0)));
        });
    }

    /**
     * Promise form of load(). Fetch failures resolve as error results.
     */
    loadAsync(url: URL): Promise<LoadResult> {
        return new Promise(resolve => this.load(url, resolve));
    }
}
