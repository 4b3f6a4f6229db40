export * from './alert.settings';
export * from './alert.engine';
export * from './alert-state';
