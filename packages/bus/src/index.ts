export * from './types';
export * from './errors';
export * from './wait';
export * from './crash-loggers';
export * from './env';
export * from './transport';
export * from './jsonl/jsonl-tail';
export * from './jsonl/jsonl-consumer';
export * from './jsonl/jsonl-producer';
export * from './queue/queue-producer';
export * from './queue/queue-consumer';
