export const name = '@evalkit/adapters';

export * from './types';

export * from './adapter';

export * from './base-adapter';

export * from './openai';
export * from './fake/adapter';
