export const name = '@repo-blob/storage';

export * from './walrus/blob-id';
export * from './walrus/client';
export * from './name-record/client';
