export * from './error.types';
export * from './synthesis.types';
