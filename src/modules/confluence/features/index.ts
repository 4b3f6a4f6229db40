export * from './trend.features';
export * from './volatility.features';
export * from './volume.features';
export * from './relative-strength.features';
export * from './positioning.features';
