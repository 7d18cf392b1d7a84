export * from './format';
export * from './status';
export * from './lists';
export * from './errors';
