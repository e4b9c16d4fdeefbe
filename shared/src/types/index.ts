export * from './driver';
export * from './location';
export * from './schedule';
export * from './trip';
