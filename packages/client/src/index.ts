export * from './stream-client';
export * from './subscriber';
export { formatRecord } from './format';
