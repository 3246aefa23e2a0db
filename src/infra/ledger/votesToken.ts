/**
 * Reference voting-rights token backed by the ledger state.
 *
 * Voting power equals balance (every holder is self-delegated). Each balance and
 * supply change appends a checkpoint at the current ledger time, so historical
 * lookups are immutable once that second has passed.
 */

import {
  decodeFunctionData,
  zeroAddress,
  type Address,
  type DecodeFunctionDataReturnType,
} from 'viem';
import { VotesTokenAbi } from '../../abi/VotesToken.js';
import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import type { GovernanceToken } from '../../domain/governance/governanceTypes.js';
import { Checkpoint, TokenLedgerState } from '../../types.js';
import { addAmount, parseAmount } from '../../utils/amount.js';
import { toAccount } from '../../utils/address.js';
import { CallTarget, ContractCall } from './callRouter.js';
import { LedgerClock } from './clock.js';
import { StateStore } from '../storage/stateStore.js';

/** Value of the last checkpoint at or before `timepoint`. */
export function upperLookup(checkpoints: readonly Checkpoint[], timepoint: number): bigint {
  let low = 0;
  let high = checkpoints.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (checkpoints[mid].timepoint > timepoint) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return high === 0 ? 0n : BigInt(checkpoints[high - 1].value);
}

function pushCheckpoint(checkpoints: Checkpoint[], timepoint: number, value: bigint): void {
  const last = checkpoints[checkpoints.length - 1];
  if (last && last.timepoint === timepoint) {
    last.value = value.toString();
    return;
  }
  checkpoints.push({ timepoint, value: value.toString() });
}

export class LedgerVotesToken implements GovernanceToken, CallTarget {
  constructor(
    private readonly store: StateStore,
    private readonly clock: LedgerClock,
  ) {}

  // ─── Reads ──────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    const holder = toAccount(account);
    return this.store.view((state) => parseAmount(state.token.balances[holder] ?? '0', 'balance'));
  }

  totalSupply(): bigint {
    return this.store.view((state) => parseAmount(state.token.totalSupply, 'totalSupply'));
  }

  maxSupply(): bigint {
    return this.store.view((state) => parseAmount(state.token.maxSupply, 'maxSupply'));
  }

  minter(): Address {
    return this.store.view((state) => state.token.minter);
  }

  currentVotingPower(account: Address): bigint {
    return this.balanceOf(account);
  }

  votingPowerAt(account: Address, checkpoint: number): bigint {
    this.assertPast(checkpoint);
    const holder = toAccount(account);
    return this.store.view((state) => upperLookup(state.token.checkpoints[holder] ?? [], checkpoint));
  }

  totalSupplyAt(checkpoint: number): bigint {
    this.assertPast(checkpoint);
    return this.store.view((state) => upperLookup(state.token.supplyCheckpoints, checkpoint));
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * One-time setup of the minter and supply cap.
   */
  async initialize(minter: Address, maxSupply: bigint): Promise<void> {
    const initialMinter = toAccount(minter, 'minter');
    await this.store.transaction((state) => {
      if (state.token.minter !== zeroAddress) {
        throw domainError(ErrorCode.AuthorityLocked, 'Token is already initialized.');
      }
      if (maxSupply <= 0n) {
        throw domainError(ErrorCode.InvalidArgument, 'maxSupply must be positive.');
      }
      state.token.minter = initialMinter;
      state.token.maxSupply = maxSupply.toString();
    });
  }

  async setMinter(caller: Address, newMinter: Address): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const next = toAccount(newMinter, 'newMinter');
    await this.store.transaction((state) => {
      if (state.token.minter !== sender) {
        throw domainError(ErrorCode.Unauthorized, 'Only the current minter can hand over minting.');
      }
      state.token.minter = next;
    });
  }

  async mint(caller: Address, to: Address, amount: bigint): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const recipient = toAccount(to, 'to');
    if (recipient === zeroAddress) {
      throw domainError(ErrorCode.InvalidArgument, 'Cannot mint to the zero address.');
    }
    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidArgument, 'Mint amount must be positive.');
    }

    await this.store.transaction((state) => {
      if (state.token.minter !== sender) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is not the token minter.', { caller: sender });
      }

      const supply = parseAmount(state.token.totalSupply, 'totalSupply');
      const cap = parseAmount(state.token.maxSupply, 'maxSupply');
      if (supply + amount > cap) {
        throw domainError(ErrorCode.InvalidArgument, 'Mint would exceed the maximum supply.', {
          totalSupply: supply.toString(),
          maxSupply: cap.toString(),
          amount: amount.toString(),
        });
      }

      const now = this.clock.now();
      this.credit(state.token, recipient, amount, now);
      state.token.totalSupply = (supply + amount).toString();
      pushCheckpoint(state.token.supplyCheckpoints, now, supply + amount);
    });
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    const sender = toAccount(from, 'from');
    const recipient = toAccount(to, 'to');
    if (recipient === zeroAddress) {
      throw domainError(ErrorCode.InvalidArgument, 'Cannot transfer to the zero address.');
    }
    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidArgument, 'Transfer amount must be positive.');
    }

    await this.store.transaction((state) => {
      const available = parseAmount(state.token.balances[sender] ?? '0', 'balance');
      if (available < amount) {
        throw domainError(ErrorCode.InvalidArgument, 'Insufficient token balance.', {
          account: sender,
          available: available.toString(),
          requested: amount.toString(),
        });
      }
      const now = this.clock.now();
      this.credit(state.token, sender, -amount, now);
      this.credit(state.token, recipient, amount, now);
    });
  }

  async handleCall(call: ContractCall): Promise<void> {
    let decoded: DecodeFunctionDataReturnType<typeof VotesTokenAbi>;
    try {
      decoded = decodeFunctionData({ abi: VotesTokenAbi, data: call.data });
    } catch {
      throw domainError(ErrorCode.ExternalActionFailure, 'Token does not implement the called function.', {
        data: call.data,
      });
    }

    switch (decoded.functionName) {
      case 'mint': {
        const [to, amount] = decoded.args;
        await this.mint(call.caller, to, amount);
        return;
      }
      case 'transfer': {
        const [to, amount] = decoded.args;
        await this.transfer(call.caller, to, amount);
        return;
      }
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private credit(token: TokenLedgerState, account: Address, delta: bigint, now: number): void {
    const next = addAmount(token.balances[account], delta, 'balance');
    token.balances[account] = next;
    const history = token.checkpoints[account] ?? [];
    pushCheckpoint(history, now, BigInt(next));
    token.checkpoints[account] = history;
  }

  private assertPast(checkpoint: number): void {
    const now = this.clock.now();
    if (!Number.isInteger(checkpoint) || checkpoint >= now) {
      throw domainError(ErrorCode.FutureLookup, 'Checkpoint must be strictly in the past.', {
        checkpoint,
        now,
      });
    }
  }
}
