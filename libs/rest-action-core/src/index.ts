export * from './types';
export * from './errors';
export * from './config';
export * from './fingerprint';
export * from './scheduler';
export * from './cache';
export * from './rateLimitPolicy';
export * from './tokenGuard';
export * from './RestAction';
export * from './RestClient';
export * from './endpoint';
export * from './refresh';
export { createDefaultRestClient, ConsoleLogger } from './factories';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
