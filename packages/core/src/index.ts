export * from './types';
export * from './errors';
export * from './constants';
export * from './logging';
export * from './model';
export * from './dialect';
export * from './join';
export * from './generator';
export { validateQueryModel } from './utils/validation';
