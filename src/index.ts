export * from './types';
export * from './crypto';
export * from './core/errors';
export * from './core/hashing';
export * from './core/unit-of-work';
export * from './core/state-machine';
export * from './core/payment-distribution';
export * from './ledger/ledger-adapter';
export * from './ledger/payment-ledger';
export * from './ledger/token-store';
export * from './token/mint-controller';
export * from './token/token-api';
export * from './store/state-store';
export * from './node/admin-keys';
export * from './node/mint-node';
export * from './auth/request-auth';
export * from './server/api-server';
export * from './client/mint-client';
export * from './config';
