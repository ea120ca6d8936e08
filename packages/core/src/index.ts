export const name = '@evalkit/core';

export * from './validation';
export * from './judge';
export * from './pipeline';
export * from './config/loader';
export * from './registry';
