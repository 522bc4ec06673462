export * from './users';
export * from './accounts';
export * from './roles';
export * from './sessions';
export * from './verification-codes';
