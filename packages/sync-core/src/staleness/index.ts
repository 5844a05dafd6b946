export * from './types';
export * from './staleness-checker';
