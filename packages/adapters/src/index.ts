export type * from './types';
export * from './errors';
export * from './abi';
export * from './amm';
export * from './rpc';
export * from './uniswapV2Exchange';
export * from './nativeAsset';
export * from './memoryExchange';
