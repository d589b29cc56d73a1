export * from './types/counts';
export * from './types/audit';
export * from './types/stream-protocol';
export * from './types/health';
export * from './validation/count-payload';
export * from './integrity/signature';
export * from './errors';
export * from './utils/datetime';
