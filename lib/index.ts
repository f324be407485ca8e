export { Loader, ILoader } from './loader';
export { FetchEngine, AxiosFetchEngine, sharedFetchEngine } from './interfaces/fetch-engine-interface';
export { IHttpClient, AxiosHttpClient } from './interfaces/http-interface';
export { LoadResult } from './models/result';
export { FetchCompletionHandler, FetchEngineOptions, FetchProgress, ResponseMetadata } from './models/fetch';
