export const CONTRACT_VERSION = '1.0.0';

export * from './reading-v1';
export * from './errors';
