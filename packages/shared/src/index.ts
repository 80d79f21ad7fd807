export * from './types/email';
export * from './types/mailbox';
export * from './types/logger';
export * from './utils/format';
export * from './utils/escape';
