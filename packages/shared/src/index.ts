export * from './errors';
export * from './labels';
export * from './notes';
export * from './query';
export * from './queryMatch';
