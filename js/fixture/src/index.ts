export * from './types';
export * from './errors';
export * from './layout';
export * from './proto';
export * from './json';
export * from './fs';
