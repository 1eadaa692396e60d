// Bitcoin node types
export * from './bitcoin/node';

// RPC types
export * from './rpc/json-rpc';
export * from './rpc/result';

// Monitoring types
export * from './monitoring/config';
export * from './monitoring/pod';
