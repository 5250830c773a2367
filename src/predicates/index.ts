export * from './compare';
export * from './containers';
export * from './filters';
