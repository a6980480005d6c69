export * from './lru';
export * from './fingerprint';
