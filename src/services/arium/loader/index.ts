export * from './schema';
export * from './yamlLoader';
