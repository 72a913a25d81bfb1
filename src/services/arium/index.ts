export * from './types';
export * from './messages';
export * from './memory';
export * from './executionPlan';
export * from './planParser';
export * from './planTools';
export * from './variables';
export * from './policies';
export * from './engine';
export * from './builder';
export * from './visualize';
export * from './nodes';
export * from './routers';
export * from './loader';
