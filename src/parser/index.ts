export * from './types';
export * from './lines';
export * from './dotenv';
