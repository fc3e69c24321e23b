export * from './models';
export * from './views';
