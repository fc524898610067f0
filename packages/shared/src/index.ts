export const name = '@repo-blob/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
