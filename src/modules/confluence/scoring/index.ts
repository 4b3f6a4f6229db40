export * from './score-result';
export * from './trend.score';
export * from './volatility.score';
export * from './volume.score';
export * from './relative-strength.score';
export * from './positioning.score';
export * from './regime.classifier';
export * from './confluence';
