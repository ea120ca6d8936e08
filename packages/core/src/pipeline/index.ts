export * from './evaluate';
export * from './chat';
