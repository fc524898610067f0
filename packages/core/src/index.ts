export const name = '@repo-blob/core';

export * from './config/loader';
export * from './ci/context';
export * from './pipeline/clients';
export * from './pipeline/steps';
export * from './pipeline/run';
