export * from './types';
export * from './boundary-reconciler';
