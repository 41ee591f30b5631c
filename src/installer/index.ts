export * from './install';
