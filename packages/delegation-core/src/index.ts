export * from './caveats';
export * from './constants';
export * from './delegation';
export * from './errors';
export * from './executions';
export * from './math';
export type * from './types';
