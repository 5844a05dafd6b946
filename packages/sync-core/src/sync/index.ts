export * from './types';
export * from './pairs';
export * from './sync-service';
