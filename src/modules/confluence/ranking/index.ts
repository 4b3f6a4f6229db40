export * from './ranking.filter';
export * from './ranking.engine';
