export * from './clock';
export * from './DelegatorAccount';
export * from './ExecutionRuntime';
export * from './InMemoryLedger';
export * from './SignatureVerifier';
export * from './StateJournal';
export * from './TokenContract';
