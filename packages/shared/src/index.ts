export * from './types/market-data';
export * from './utils/source-id';
