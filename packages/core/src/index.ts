export * from './types';
export * from './errors';
export * from './dialect';
export * from './builder';
export { ArgumentBuffer } from './arguments/argument-buffer';
export { consoleLogger, truncateSql, formatParams } from './utils/logging';
export { display } from './utils/display';
