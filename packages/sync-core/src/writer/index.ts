export * from './upsert-writer';
