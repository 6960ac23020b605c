export * from './logger';
export * from './tracer';
export * from './metrics';
