export * from './types';
export * from './errors';
export * from './obs/logger';
export * from './registry';
export * from './schedule';
export * from './accrual';
export * from './settings';
export * from './guard';
export * from './journal';
export * from './events';
export * from './conversion';
export * from './interceptor';
export * from './admin';
export * from './memoryLedger';
export * from './roles';
export * from './token';
export * from './live';
