import type { Address } from 'viem';
import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { addAmount, parseAmount } from '../../utils/amount.js';
import { toAccount } from '../../utils/address.js';
import { StateStore } from '../storage/stateStore.js';

/**
 * Native value balances held by accounts and contracts (treasury funds).
 */
export class NativeLedger {
  constructor(private readonly store: StateStore) {}

  balanceOf(account: Address): bigint {
    const normalized = toAccount(account);
    return this.store.view((state) => parseAmount(state.native[normalized] ?? '0', 'balance'));
  }

  async credit(account: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidArgument, 'Credit amount must be positive.');
    }
    const normalized = toAccount(account);
    await this.store.transaction((state) => {
      state.native[normalized] = addAmount(state.native[normalized], amount, 'balance');
    });
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidArgument, 'Transfer amount must be positive.');
    }
    const sender = toAccount(from, 'from');
    const recipient = toAccount(to, 'to');

    await this.store.transaction((state) => {
      const available = parseAmount(state.native[sender] ?? '0', 'balance');
      if (available < amount) {
        throw domainError(ErrorCode.InvalidArgument, 'Insufficient native balance.', {
          account: sender,
          available: available.toString(),
          requested: amount.toString(),
        });
      }
      state.native[sender] = addAmount(state.native[sender], -amount, 'balance');
      state.native[recipient] = addAmount(state.native[recipient], amount, 'balance');
    });
  }
}
