export * from './types/stress-test';
