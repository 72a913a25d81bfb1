export * from './agent';
export * from './functionNode';
export * from './ariumNode';
export * from './forEachNode';
