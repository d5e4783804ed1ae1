export * from './logging/index';
export * from './shell/index';
export * from './capabilities/index';
