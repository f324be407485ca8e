export * from './common';
export * from './fetch';
export * from './result';
