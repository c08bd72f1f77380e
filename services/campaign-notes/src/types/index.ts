export * from './entities';
export * from './deduplication';
