export * from './schemas';
export * from './format';
export * from './retry';
export * from './checkpoint';
export * from './balanceBook';
