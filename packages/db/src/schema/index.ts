export * from './kds';
