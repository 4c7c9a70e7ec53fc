export * from './actions';
export * from './caveatBuilder';
export { loadConfig, type FrameworkConfig } from './config';
export * from './delegation';
export {
  DelegationManager,
  delegationManagerAbi,
  type RedeemDelegationsParams,
} from './DelegationFramework/DelegationManager';
export * from './DelegationFramework/enforcers';
export {
  createDelegationFramework,
  deployDelegationFramework,
  getContractAddress,
  type CaveatEnforcerName,
  type CaveatEnforcers,
  type DelegationEnvironment,
  type DelegationFramework,
} from './environment';
export { getLogger, setLogger, type Logger } from './logger';
export * from './runtime';
