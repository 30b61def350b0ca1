export * from './token';
export * from './ast';
export * from './vm';
export * from './errors';
