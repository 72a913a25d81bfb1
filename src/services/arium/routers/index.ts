export * from './llmRouter';
export * from './reflectionRouter';
export * from './planExecuteRouter';
export * from './factory';
