export * from './types';
export * from './deadzone';
export * from './gap-backfiller';
