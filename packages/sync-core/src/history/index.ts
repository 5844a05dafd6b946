export * from './history-fetcher';
