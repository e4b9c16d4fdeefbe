export * from './duty-status';
export * from './limits';
