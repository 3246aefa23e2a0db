/**
 * Proposal registry.
 *
 * Token holders above the proposal threshold open proposals; holders vote with
 * their weight at the proposal's snapshot checkpoint. Once the voting window has
 * closed anyone can finalize, and the executing authority (the execution queue
 * after setup) executes passed proposals, which dispatches the proposal's action.
 */

import {
  decodeFunctionData,
  encodeFunctionData,
  zeroAddress,
  type Address,
  type DecodeFunctionDataReturnType,
  type Hex,
} from 'viem';
import { GovernorAbi } from '../abi/Governor.js';
import {
  GovernanceToken,
  Proposal,
  ProposalAction,
  ProposalStatus,
  QuorumProgress,
  VoteReceipt,
  VoterEligibility,
} from '../domain/governance/governanceTypes.js';
import { quorumFor, tallyOutcome } from '../domain/governance/tally.js';
import { DomainError, domainError, ErrorCode } from '../errors/taxonomy.js';
import { CallTarget, ContractCall } from '../infra/ledger/callRouter.js';
import { LedgerClock } from '../infra/ledger/clock.js';
import { NativeLedger } from '../infra/ledger/nativeLedger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransitionPublisher } from '../infra/transitions.js';
import { AppState } from '../types.js';
import { addAmount } from '../utils/amount.js';
import { toAccount } from '../utils/address.js';

export interface GovernanceOptions {
  /** The registry's own ledger address; it holds the treasury and mints. */
  address: Address;
  /** Minimum current voting power needed to open a proposal. */
  proposalThreshold: bigint;
  votingDurationSeconds: number;
}

export type CreateProposalInput =
  | { kind: 'general'; description: string }
  | { kind: 'mint_tokens'; description: string; target: Address; amount: bigint }
  | { kind: 'transfer_funds'; description: string; target: Address; amount: bigint }
  | { kind: 'update_quorum'; description: string; newPercentage: number };

function buildAction(input: CreateProposalInput): ProposalAction {
  switch (input.kind) {
    case 'general':
      return { kind: 'general' };
    case 'mint_tokens':
    case 'transfer_funds': {
      if (input.amount <= 0n) {
        throw domainError(ErrorCode.InvalidArgument, 'Amount must be greater than zero.');
      }
      const target = toAccount(input.target, 'target');
      if (target === zeroAddress) {
        throw domainError(ErrorCode.InvalidArgument, 'Target must not be the zero address.');
      }
      return { kind: input.kind, target, amount: input.amount.toString() };
    }
    case 'update_quorum':
      if (!Number.isInteger(input.newPercentage) || input.newPercentage < 1 || input.newPercentage > 100) {
        throw domainError(ErrorCode.InvalidArgument, 'Quorum percentage must be an integer between 1 and 100.', {
          newPercentage: input.newPercentage,
        });
      }
      return { kind: 'update_quorum', newPercentage: input.newPercentage };
  }
}

const proposalKey = (id: number): string => String(id);

export class GovernanceService implements CallTarget {
  private readonly self: Address;

  constructor(
    private readonly store: StateStore,
    private readonly clock: LedgerClock,
    private readonly token: GovernanceToken,
    private readonly native: NativeLedger,
    private readonly publisher: TransitionPublisher,
    private readonly options: GovernanceOptions,
  ) {
    if (!Number.isInteger(options.votingDurationSeconds) || options.votingDurationSeconds <= 0) {
      throw new RangeError('votingDurationSeconds must be a positive integer');
    }
    this.self = toAccount(options.address, 'address');
  }

  get address(): Address {
    return this.self;
  }

  get proposalThreshold(): bigint {
    return this.options.proposalThreshold;
  }

  // ─── Creation ───────────────────────────────────────────────────────

  proposeGeneral(caller: Address, description: string): Promise<Proposal> {
    return this.createProposal(caller, { kind: 'general', description });
  }

  proposeMint(caller: Address, description: string, target: Address, amount: bigint): Promise<Proposal> {
    return this.createProposal(caller, { kind: 'mint_tokens', description, target, amount });
  }

  proposeTransfer(caller: Address, description: string, target: Address, amount: bigint): Promise<Proposal> {
    return this.createProposal(caller, { kind: 'transfer_funds', description, target, amount });
  }

  proposeQuorumUpdate(caller: Address, description: string, newPercentage: number): Promise<Proposal> {
    return this.createProposal(caller, { kind: 'update_quorum', description, newPercentage });
  }

  async createProposal(caller: Address, input: CreateProposalInput): Promise<Proposal> {
    const proposer = toAccount(caller, 'caller');

    return this.store.transaction((state) => {
      const power = this.token.currentVotingPower(proposer);
      if (power === 0n || power < this.options.proposalThreshold) {
        throw domainError(ErrorCode.Unauthorized, 'Proposer is below the proposal threshold.', {
          votingPower: power.toString(),
          threshold: this.options.proposalThreshold.toString(),
        });
      }

      const description = input.description.trim();
      if (!description) {
        throw domainError(ErrorCode.InvalidArgument, 'Description must not be empty.');
      }
      const action = buildAction(input);

      const now = this.clock.now();
      const id = state.governance.proposalCount + 1;
      const proposal: Proposal = {
        id,
        proposer,
        description,
        forVotes: '0',
        againstVotes: '0',
        startTime: now,
        endTime: now + this.options.votingDurationSeconds,
        snapshotCheckpoint: now - 1,
        status: 'active',
        action,
        executed: false,
      };

      state.governance.proposals[proposalKey(id)] = proposal;
      state.governance.proposalCount = id;

      this.publisher.publish('proposal.created', {
        proposalId: id,
        proposer,
        description,
        snapshotCheckpoint: proposal.snapshotCheckpoint,
        endTime: proposal.endTime,
        action,
      });

      return structuredClone(proposal);
    });
  }

  // ─── Voting ─────────────────────────────────────────────────────────

  /**
   * Cast a vote. Each account votes once per proposal, with its snapshot weight.
   */
  async castVote(caller: Address, proposalId: number, support: boolean): Promise<VoteReceipt> {
    const voter = toAccount(caller, 'caller');

    return this.store.transaction((state) => {
      const proposal = this.requireProposal(state, proposalId);
      const ballots = state.governance.votes[proposalKey(proposal.id)] ?? {};

      if (ballots[voter]) {
        throw domainError(ErrorCode.AlreadyVoted, 'Account has already voted on this proposal.', {
          proposalId,
          voter,
        });
      }

      const now = this.clock.now();
      if (proposal.status !== 'active' || now > proposal.endTime) {
        throw domainError(ErrorCode.NotActive, `Proposal is not open for voting.`, {
          proposalId,
          status: proposal.status,
          endTime: proposal.endTime,
        });
      }

      const weight = this.token.votingPowerAt(voter, proposal.snapshotCheckpoint);
      if (weight === 0n) {
        throw domainError(ErrorCode.NoVotingPower, 'Account had no voting power at the proposal snapshot.', {
          proposalId,
          voter,
          snapshotCheckpoint: proposal.snapshotCheckpoint,
        });
      }

      const receipt: VoteReceipt = {
        proposalId: proposal.id,
        voter,
        support,
        weight: weight.toString(),
        castAt: now,
      };
      ballots[voter] = receipt;
      state.governance.votes[proposalKey(proposal.id)] = ballots;

      if (support) {
        proposal.forVotes = addAmount(proposal.forVotes, weight, 'forVotes');
      } else {
        proposal.againstVotes = addAmount(proposal.againstVotes, weight, 'againstVotes');
      }

      this.publisher.publish('vote.cast', {
        proposalId: proposal.id,
        voter,
        support,
        weight: receipt.weight,
      });

      return structuredClone(receipt);
    });
  }

  // ─── Finalization & execution ───────────────────────────────────────

  /**
   * Settle an Active proposal whose voting window has closed. Callable by anyone.
   *
   * Quorum uses the supply at the snapshot but the quorum percentage in force now,
   * so a quorum change also applies to proposals already in flight.
   */
  async finalize(proposalId: number): Promise<Proposal> {
    return this.store.transaction((state) => {
      const proposal = this.requireProposal(state, proposalId);
      this.settle(state, proposal);
      return structuredClone(proposal);
    });
  }

  async execute(caller: Address, proposalId: number): Promise<Proposal> {
    const sender = toAccount(caller, 'caller');

    return this.store.transaction(async (state) => {
      if (sender !== state.governance.executor) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is not the executing authority.', { caller: sender });
      }

      const proposal = this.requireProposal(state, proposalId);
      const now = this.clock.now();
      if (proposal.status === 'active' && now > proposal.endTime) {
        this.settle(state, proposal);
      }

      if (proposal.executed) {
        throw domainError(ErrorCode.AlreadyExecuted, 'Proposal has already been executed.', { proposalId });
      }
      if (proposal.status !== 'passed') {
        throw domainError(ErrorCode.NotPassed, `Proposal is ${proposal.status}, not passed.`, {
          proposalId,
          status: proposal.status,
        });
      }

      proposal.executed = true;
      proposal.status = 'executed';
      proposal.executedAt = now;

      await this.dispatch(state, proposal);

      this.publisher.publish('proposal.executed', { proposalId: proposal.id, action: proposal.action });
      return structuredClone(proposal);
    });
  }

  async handleCall(call: ContractCall): Promise<void> {
    let decoded: DecodeFunctionDataReturnType<typeof GovernorAbi>;
    try {
      decoded = decodeFunctionData({ abi: GovernorAbi, data: call.data });
    } catch {
      throw domainError(ErrorCode.ExternalActionFailure, 'Registry does not implement the called function.', {
        data: call.data,
      });
    }

    const [rawId] = decoded.args;
    const proposalId = rawId > BigInt(Number.MAX_SAFE_INTEGER) ? -1 : Number(rawId);
    await this.execute(call.caller, proposalId);
  }

  /**
   * The call the execution queue schedules to execute a proposal.
   */
  executionCall(proposalId: number): { target: Address; value: bigint; data: Hex } {
    return {
      target: this.self,
      value: 0n,
      data: encodeFunctionData({ abi: GovernorAbi, functionName: 'execute', args: [BigInt(proposalId)] }),
    };
  }

  // ─── Executing authority ────────────────────────────────────────────

  /**
   * Set the first executing authority. Only possible while none is set.
   */
  async initializeExecutor(account: Address): Promise<void> {
    const executor = toAccount(account);
    await this.store.transaction((state) => {
      if (state.governance.executor !== zeroAddress) {
        throw domainError(ErrorCode.AuthorityLocked, 'Executing authority is already set.');
      }
      state.governance.executor = executor;
    });
  }

  /**
   * Hand execution rights to a new authority. Allowed exactly once.
   */
  async transferExecutorship(caller: Address, newAuthority: Address): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const next = toAccount(newAuthority, 'newAuthority');

    await this.store.transaction((state) => {
      if (state.governance.executorHandedOff) {
        throw domainError(ErrorCode.AuthorityLocked, 'Executing authority has already been handed off.');
      }
      if (sender !== state.governance.executor) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is not the executing authority.', { caller: sender });
      }
      if (next === zeroAddress) {
        throw domainError(ErrorCode.InvalidArgument, 'New authority must not be the zero address.');
      }
      state.governance.executor = next;
      state.governance.executorHandedOff = true;
    });
  }

  getExecutor(): Address {
    return this.store.view((state) => state.governance.executor);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  proposalCount(): number {
    return this.store.view((state) => state.governance.proposalCount);
  }

  getQuorumPercentage(): number {
    return this.store.view((state) => state.governance.quorumPercentage);
  }

  getProposal(proposalId: number): Proposal | null {
    return this.store.view((state) => {
      const proposal = state.governance.proposals[proposalKey(proposalId)];
      return proposal ? structuredClone(proposal) : null;
    });
  }

  /**
   * List proposals, newest first, optionally filtered by status.
   */
  listProposals(statusFilter?: ProposalStatus): Proposal[] {
    return this.store.view((state) => Object.values(state.governance.proposals)
      .filter((p) => !statusFilter || p.status === statusFilter)
      .sort((a, b) => b.id - a.id)
      .map((p) => structuredClone(p)));
  }

  /** Proposals still accepting votes. */
  listActiveProposals(): Proposal[] {
    const now = this.clock.now();
    return this.listProposals('active').filter((p) => now <= p.endTime);
  }

  getVoteReceipt(proposalId: number, account: Address): VoteReceipt | null {
    const voter = toAccount(account);
    return this.store.view((state) => {
      const receipt = state.governance.votes[proposalKey(proposalId)]?.[voter];
      return receipt ? structuredClone(receipt) : null;
    });
  }

  getVoterEligibility(proposalId: number, account: Address): VoterEligibility {
    const voter = toAccount(account);

    return this.store.view((state) => {
      const proposal = this.requireProposal(state, proposalId);
      const hasVoted = Boolean(state.governance.votes[proposalKey(proposal.id)]?.[voter]);
      const weight = this.token.votingPowerAt(voter, proposal.snapshotCheckpoint);
      const open = proposal.status === 'active' && this.clock.now() <= proposal.endTime;

      let reason: VoterEligibility['reason'];
      if (hasVoted) reason = 'already_voted';
      else if (!open) reason = 'not_active';
      else if (weight === 0n) reason = 'no_voting_power';

      return {
        proposalId: proposal.id,
        account: voter,
        hasVoted,
        weight: weight.toString(),
        canVote: reason === undefined,
        ...(reason ? { reason } : {}),
      };
    });
  }

  getQuorumProgress(proposalId: number): QuorumProgress {
    return this.store.view((state) => {
      const proposal = this.requireProposal(state, proposalId);
      const quorumPercentage = state.governance.quorumPercentage;
      const snapshotSupply = this.token.totalSupplyAt(proposal.snapshotCheckpoint);
      const quorumRequired = quorumFor(snapshotSupply, quorumPercentage);
      const votesCast = BigInt(proposal.forVotes) + BigInt(proposal.againstVotes);
      const rawBps = quorumRequired === 0n ? 10_000n : (votesCast * 10_000n) / quorumRequired;
      const progressBps = Number(rawBps > 10_000n ? 10_000n : rawBps);

      return {
        proposalId: proposal.id,
        quorumPercentage,
        snapshotSupply: snapshotSupply.toString(),
        quorumRequired: quorumRequired.toString(),
        votesCast: votesCast.toString(),
        reached: votesCast >= quorumRequired,
        progressBps,
      };
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private requireProposal(state: AppState, proposalId: number): Proposal {
    const proposal = Number.isInteger(proposalId) && proposalId >= 1 && proposalId <= state.governance.proposalCount
      ? state.governance.proposals[proposalKey(proposalId)]
      : undefined;
    if (!proposal) {
      throw domainError(ErrorCode.ProposalNotFound, 'Proposal not found.', { proposalId });
    }
    return proposal;
  }

  private settle(state: AppState, proposal: Proposal): void {
    if (proposal.status !== 'active') {
      throw domainError(ErrorCode.NotActive, `Proposal is already ${proposal.status}.`, {
        proposalId: proposal.id,
        status: proposal.status,
      });
    }

    const now = this.clock.now();
    if (now <= proposal.endTime) {
      throw domainError(ErrorCode.VotingNotEnded, 'Voting window has not closed yet.', {
        proposalId: proposal.id,
        endTime: proposal.endTime,
        now,
      });
    }

    const outcome = tallyOutcome({
      forVotes: BigInt(proposal.forVotes),
      againstVotes: BigInt(proposal.againstVotes),
      snapshotSupply: this.token.totalSupplyAt(proposal.snapshotCheckpoint),
      quorumPercentage: state.governance.quorumPercentage,
    });

    proposal.status = outcome.status;
    proposal.finalizedAt = now;

    this.publisher.publish('proposal.finalized', {
      proposalId: proposal.id,
      status: outcome.status,
      forVotes: proposal.forVotes,
      againstVotes: proposal.againstVotes,
      quorumRequired: outcome.quorumRequired.toString(),
    });
  }

  private async dispatch(state: AppState, proposal: Proposal): Promise<void> {
    const action = proposal.action;

    switch (action.kind) {
      case 'general':
        return;
      case 'mint_tokens': {
        const { target, amount } = action;
        await this.external(proposal, () => this.token.mint(this.address, target, BigInt(amount)));
        return;
      }
      case 'transfer_funds': {
        const { target } = action;
        const amount = BigInt(action.amount);
        const held = this.native.balanceOf(this.address);
        if (held < amount) {
          throw domainError(ErrorCode.ExternalActionFailure, 'Treasury balance is insufficient for the transfer.', {
            proposalId: proposal.id,
            available: held.toString(),
            requested: amount.toString(),
          });
        }
        await this.external(proposal, () => this.native.transfer(this.address, target, amount));
        return;
      }
      case 'update_quorum': {
        const previous = state.governance.quorumPercentage;
        state.governance.quorumPercentage = action.newPercentage;
        this.publisher.publish('quorum.updated', {
          proposalId: proposal.id,
          previous,
          next: action.newPercentage,
        });
        return;
      }
      default: {
        const unknownAction: never = action;
        throw domainError(ErrorCode.InternalError, 'Unknown proposal action.', { action: unknownAction });
      }
    }
  }

  private async external(proposal: Proposal, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      throw domainError(ErrorCode.ExternalActionFailure, `Action for proposal ${proposal.id} failed.`, {
        proposalId: proposal.id,
        action: proposal.action.kind,
        reason: error instanceof DomainError ? error.code : 'unexpected',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
