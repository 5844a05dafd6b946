export * from './status-reporter';
