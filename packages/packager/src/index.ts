export * from './types';
export * from './exclusion';
export * from './content';
export * from './packager';
export * from './document';
