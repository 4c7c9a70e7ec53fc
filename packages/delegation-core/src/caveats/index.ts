export * from './addressList';
export * from './allowedCalldata';
export * from './allowedMethods';
export * from './balanceChange';
export * from './blockNumber';
export * from './exactCalldata';
export * from './exactExecution';
export * from './logicalOrWrapper';
export * from './payment';
export * from './periodTransfer';
export * from './simple';
export * from './specificActionTokenTransferBatch';
export * from './streaming';
export * from './swapOffer';
export * from './timestamp';
export * from './transferAmount';
export * from './uint';
export {
  assertTermsLength,
  readAddress,
  readBytes,
  readUint,
  type DecodeTermsOptions,
} from './utils';
