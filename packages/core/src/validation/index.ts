export * from './types';
export * from './chain';
export * from './rules';
export * from './ruleset';
