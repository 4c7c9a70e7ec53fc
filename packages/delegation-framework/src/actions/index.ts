export * from './getCaveatAvailableAmount';
