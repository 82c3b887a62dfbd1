export { MultiPoolStaking } from './MultiPoolStaking.js';
export type { LedgerState, StakingCollaborators } from './MultiPoolStaking.js';
export { EmissionSchedule } from './EmissionSchedule.js';
export { PoolRegistry } from './PoolRegistry.js';
export { SettlementEngine } from './SettlementEngine.js';
export type { Settlement } from './SettlementEngine.js';
export { UserLedger, accruedReward, freshAccrual, owedReward } from './UserLedger.js';
export * as WithdrawalQueue from './WithdrawalQueue.js';
export { encodeLedgerState, decodeLedgerState, SNAPSHOT_VERSION } from './snapshot.js';
export type * from './types.js';
