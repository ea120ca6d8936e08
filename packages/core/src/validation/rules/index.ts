export * from './not_empty';
export * from './length';
export * from './json';
export * from './json_schema';
export * from './contains';
export * from './regex';
export * from './custom';
