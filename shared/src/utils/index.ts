export * from './date';
export * from './geo';
export * from './status';
