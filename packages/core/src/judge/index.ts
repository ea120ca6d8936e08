export * from './types';
export * from './rubrics';
export * from './parse';
export * from './reconcile';
export * from './judge';
