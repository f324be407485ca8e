export * from './fetch-engine-interface';
export * from './fs-interface';
export * from './http-interface';
export * from './progress-interface';
