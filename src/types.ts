import type { Address } from 'viem';
import type { RoleState } from './domain/access/roles.js';
import type { GovernanceState } from './domain/governance/governanceTypes.js';
import type { TimelockState } from './domain/timelock/timelockTypes.js';

export interface Checkpoint {
  timepoint: number;
  value: string; // bigint as string
}

export interface TokenLedgerState {
  minter: Address;
  maxSupply: string;
  totalSupply: string;
  balances: Record<Address, string>;
  /** Per-account voting power history, ascending by timepoint. */
  checkpoints: Record<Address, Checkpoint[]>;
  supplyCheckpoints: Checkpoint[];
}

export interface DeploymentRecord {
  deployer: Address;
  token: Address;
  governor: Address;
  timelock: Address;
  bootstrappedAt: number;
}

export interface AppState {
  governance: GovernanceState;
  timelock: TimelockState;
  roles: RoleState;
  token: TokenLedgerState;
  /** Native value balances (treasury funds). */
  native: Record<Address, string>;
  deployment: DeploymentRecord | null;
  metrics: {
    startedAt: string;
    transactionsCommitted: number;
  };
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  ledgerTime: number;
  activeProposals: number;
  pendingOperations: number;
  websocketClients: number;
  processPid: number;
}
