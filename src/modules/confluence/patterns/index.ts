export * from './pattern.types';
export * from './breakout.pattern';
export * from './pullback.pattern';
export * from './volatility-squeeze.pattern';
export * from './rsi-divergence.pattern';
export * from './pattern.registry';
