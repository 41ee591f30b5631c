export * from './types';
export * from './patterns';
export * from './skip';
export * from './matcher';
export * from './scan';
export * from './report';
