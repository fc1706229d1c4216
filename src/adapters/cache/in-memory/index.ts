export * from './in-memory-cache.adapter';
