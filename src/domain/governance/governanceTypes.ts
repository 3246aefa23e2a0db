/**
 * Proposal lifecycle types.
 *
 * A proposal moves Active → Passed | Failed, and Passed → Executed.
 * Vote weights come from the token's checkpoint at `snapshotCheckpoint`.
 */

import type { Address } from 'viem';

export const PROPOSAL_STATUSES = ['active', 'passed', 'failed', 'executed'] as const;

export type ProposalStatus = (typeof PROPOSAL_STATUSES)[number];

// ─── Actions ────────────────────────────────────────────────────────────

export interface GeneralAction {
  kind: 'general';
}

export interface MintTokensAction {
  kind: 'mint_tokens';
  target: Address;
  amount: string; // bigint as string
}

export interface TransferFundsAction {
  kind: 'transfer_funds';
  target: Address;
  amount: string; // bigint as string
}

export interface UpdateQuorumAction {
  kind: 'update_quorum';
  newPercentage: number;
}

export type ProposalAction =
  | GeneralAction
  | MintTokensAction
  | TransferFundsAction
  | UpdateQuorumAction;

// ─── Proposal & votes ───────────────────────────────────────────────────

export interface Proposal {
  id: number;
  proposer: Address;
  description: string;
  forVotes: string; // bigint as string
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
  voter: Address;
  support: boolean;
  weight: string;
  castAt: number;
}

export interface GovernanceState {
  proposalCount: number;
  proposals: Record<string, Proposal>;
  /** proposalId → voter → receipt. Presence of a receipt is the "has voted" flag. */
  votes: Record<string, Record<Address, VoteReceipt>>;
  quorumPercentage: number;
  executor: Address;
  executorHandedOff: boolean;
}

export interface VoterEligibility {
  proposalId: number;
  account: Address;
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
  /** Progress towards quorum in basis points, capped at 10000. */
  progressBps: number;
}

// ─── Collaborators ──────────────────────────────────────────────────────

/**
 * Historical voting weight source. Lookups must target a checkpoint strictly before
 * the current ledger time.
 */
export interface VotingPowerOracle {
  votingPowerAt(account: Address, checkpoint: number): bigint;
  totalSupplyAt(checkpoint: number): bigint;
  currentVotingPower(account: Address): bigint;
}

export interface MintableToken {
  mint(caller: Address, to: Address, amount: bigint): Promise<void>;
}

export type GovernanceToken = VotingPowerOracle & MintableToken;
