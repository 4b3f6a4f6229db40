export * from './utilities';
export * from './features';
export * from './scoring';
export * from './patterns';
export * from './ranking';
export * from './alerts';
export * from './services/market-health.service';
export * from './pipeline/score-pipeline';
