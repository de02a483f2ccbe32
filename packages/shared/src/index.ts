export * from './types';
export * from './schemas';
export * from './utils';
export * from './constants';
export * from './errors';
