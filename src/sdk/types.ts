// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the governance engine HTTP API.
// These mirror the API responses but are decoupled from internal server types.
// Amounts travel as base-10 integer strings; addresses and ids as 0x hex.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalStatus = 'active' | 'passed' | 'failed' | 'executed';
export type OperationState = 'waiting' | 'ready' | 'done';
export type OperationCategory =
  | 'proposal_execution'
  | 'parameter_change'
  | 'treasury'
  | 'token'
  | 'role_admin'
  | 'other';
export type RoleName = 'admin' | 'proposer' | 'executor' | 'canceller';

// ─── Proposals ─────────────────────────────────────────────────────────────

export type ProposalAction =
  | { kind: 'general' }
  | { kind: 'mint_tokens'; target: string; amount: string }
  | { kind: 'transfer_funds'; target: string; amount: string }
  | { kind: 'update_quorum'; newPercentage: number };

export type CreateProposalInput =
  | { kind: 'general'; description: string }
  | { kind: 'mint_tokens'; description: string; target: string; amount: string }
  | { kind: 'transfer_funds'; description: string; target: string; amount: string }
  | { kind: 'update_quorum'; description: string; newPercentage: number };

export interface Proposal {
  id: number;
  proposer: string;
  description: string;
  forVotes: string;
  againstVotes: string;
  startTime: number;
  endTime: number;
  snapshotCheckpoint: number;
  status: ProposalStatus;
  action: ProposalAction;
  executed: boolean;
  finalizedAt?: number;
  executedAt?: number;
}

export interface VoteReceipt {
  proposalId: number;
  voter: string;
  support: boolean;
  weight: string;
  castAt: number;
}

export interface VoterEligibility {
  proposalId: number;
  account: string;
  hasVoted: boolean;
  weight: string;
  canVote: boolean;
  reason?: 'already_voted' | 'not_active' | 'no_voting_power';
}

export interface QuorumProgress {
  proposalId: number;
  quorumPercentage: number;
  snapshotSupply: string;
  quorumRequired: string;
  votesCast: string;
  reached: boolean;
  progressBps: number;
}

export interface ExecutionCall {
  target: string;
  value: string;
  data: string;
}

// ─── Execution queue ───────────────────────────────────────────────────────

export interface OperationCallInput {
  target: string;
  value?: string;
  data?: string;
  predecessor?: string;
  salt?: string;
}

export interface ScheduleInput extends OperationCallInput {
  delay: number;
  description?: string;
  category?: OperationCategory;
}

export interface Operation {
  id: string;
  target: string;
  value: string;
  data: string;
  predecessor: string;
  salt: string;
  delay: number;
  scheduledAt: number;
  readyTimestamp: number;
  done: boolean;
  executedAt?: number;
  state: OperationState;
  metadata: { description: string; category: OperationCategory } | null;
}

export interface TimelockInfo {
  address: string;
  minDelay: number;
  delayFloor: number;
  maxDelay: number;
}

// ─── Roles & balances ──────────────────────────────────────────────────────

export interface RoleMembers {
  role: RoleName;
  roleId: string;
  members: string[];
}

export interface AccountBalances {
  account: string;
  balance: string;
  votingPower: string;
  nativeBalance: string;
  totalSupply: string;
  maxSupply: string;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  name: string;
  status: string;
  network: 'mainnet' | 'testnet';
  contracts: { token: string; governor: string; timelock: string };
  metrics: {
    uptimeSeconds: number;
    ledgerTime: number;
    activeProposals: number;
    pendingOperations: number;
    websocketClients: number;
    processPid: number;
  };
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
