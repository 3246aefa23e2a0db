import type { Address, Hex } from 'viem';
import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { toAccount } from '../../utils/address.js';

export interface ContractCall {
  caller: Address;
  value: bigint;
  data: Hex;
}

/** Anything that can receive a call dispatched by the execution queue. */
export interface CallTarget {
  handleCall(call: ContractCall): Promise<void>;
}

export class CallRouter {
  private readonly targets: Map<Address, CallTarget> = new Map();

  register(address: Address, target: CallTarget): void {
    this.targets.set(toAccount(address), target);
  }

  isContract(address: Address): boolean {
    return this.targets.has(toAccount(address));
  }

  /**
   * Dispatch `data` to the contract at `target`. A call with empty data to an
   * address with no contract is a plain value transfer and does nothing here.
   */
  async dispatch(caller: Address, target: Address, value: bigint, data: Hex): Promise<void> {
    const handler = this.targets.get(toAccount(target, 'target'));
    if (!handler) {
      if (data === '0x') return;
      throw domainError(ErrorCode.ExternalActionFailure, 'No contract at call target.', { target });
    }
    await handler.handleCall({ caller, value, data });
  }
}
