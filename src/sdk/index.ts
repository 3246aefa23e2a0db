// Governance engine SDK entry point
export { GovernanceClient, GovernanceAPIError } from './client.js';
export type { GovernanceClientOptions } from './client.js';
export type {
  // Core unions
  ProposalStatus,
  OperationState,
  OperationCategory,
  RoleName,

  // Proposals
  ProposalAction,
  CreateProposalInput,
  Proposal,
  VoteReceipt,
  VoterEligibility,
  QuorumProgress,
  ExecutionCall,

  // Execution queue
  OperationCallInput,
  ScheduleInput,
  Operation,
  TimelockInfo,

  // Roles & balances
  RoleMembers,
  AccountBalances,

  // System
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
