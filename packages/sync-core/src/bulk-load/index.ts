export * from './bulk-loader';
