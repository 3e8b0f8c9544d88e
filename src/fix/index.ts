export * from './constants';
export * from './field-encoder';
export * from './message-builder';
export * from './message-parser';
export * from './sequence-manager';
export * from './session';
export * from './transport';
export * from './order-client';
export * from '../errors';
export * from '../types';
export { normalizeOrderRequest, validateClientOptions } from '../utils/validate-order';
export { loadConfig } from '../utils/load-config';
