export * from './staging';
export * from './memory';
