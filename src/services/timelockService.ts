/**
 * Delayed execution queue.
 *
 * Proposers schedule calls under a content-derived id; once the delay has elapsed
 * (and any predecessor is done) an executor runs the call. Cancellers can drop
 * pending operations. Changing the minimum delay is itself a scheduled self-call.
 */

import {
  decodeFunctionData,
  isHex,
  maxUint256,
  size,
  zeroHash,
  type Address,
  type DecodeFunctionDataReturnType,
  type Hex,
} from 'viem';
import { TimelockAbi } from '../abi/Timelock.js';
import { Roles } from '../domain/access/roles.js';
import { hashOperation } from '../domain/timelock/operationId.js';
import {
  LedgerNetwork,
  OperationCall,
  OperationCategory,
  OperationMetadata,
  OperationState,
  OperationView,
  ScheduledOperation,
} from '../domain/timelock/timelockTypes.js';
import { DomainError, domainError, ErrorCode } from '../errors/taxonomy.js';
import { CallRouter, CallTarget, ContractCall } from '../infra/ledger/callRouter.js';
import { LedgerClock } from '../infra/ledger/clock.js';
import { NativeLedger } from '../infra/ledger/nativeLedger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransitionPublisher } from '../infra/transitions.js';
import { AppState } from '../types.js';
import { toAccount } from '../utils/address.js';
import { DAY_SECONDS } from '../utils/time.js';
import { RoleAuthorityService } from './roleAuthorityService.js';

export const MAX_DELAY_SECONDS = 30 * DAY_SECONDS;

/** Lowest minimum delay each network accepts. */
export const NETWORK_DELAY_FLOORS: Record<LedgerNetwork, number> = {
  mainnet: 2 * DAY_SECONDS,
  testnet: 5 * 60,
};

export interface TimelockOptions {
  /** The queue's own ledger address; self-calls must come from it. */
  address: Address;
  network: LedgerNetwork;
}

export interface OperationCallInput {
  target: Address;
  value?: bigint;
  data?: Hex;
  predecessor?: Hex;
  salt?: Hex;
}

export interface ScheduleInput extends OperationCallInput {
  delay: number;
  description?: string;
  category?: OperationCategory;
}

function isBytes32(value: Hex): boolean {
  return isHex(value, { strict: true }) && size(value) === 32;
}

export class TimelockService implements CallTarget {
  private readonly self: Address;

  constructor(
    private readonly store: StateStore,
    private readonly clock: LedgerClock,
    private readonly roles: RoleAuthorityService,
    private readonly router: CallRouter,
    private readonly native: NativeLedger,
    private readonly publisher: TransitionPublisher,
    private readonly options: TimelockOptions,
  ) {
    this.self = toAccount(options.address, 'address');
  }

  get address(): Address {
    return this.self;
  }

  get delayFloor(): number {
    return NETWORK_DELAY_FLOORS[this.options.network];
  }

  getMinDelay(): number {
    return this.store.view((state) => Math.max(state.timelock.minDelay, this.delayFloor));
  }

  /**
   * Set the starting minimum delay. Later changes go through a scheduled `updateDelay`.
   */
  async initializeMinDelay(delay: number): Promise<void> {
    await this.store.transaction((state) => {
      if (state.timelock.minDelay !== 0) {
        throw domainError(ErrorCode.AuthorityLocked, 'Minimum delay is already initialized.');
      }
      this.assertDelayBounds(delay);
      state.timelock.minDelay = delay;
    });
  }

  hashOperation(input: OperationCallInput): Hex {
    return hashOperation(this.normalizeCall(input));
  }

  // ─── Scheduling ─────────────────────────────────────────────────────

  async schedule(caller: Address, input: ScheduleInput): Promise<OperationView> {
    const sender = toAccount(caller, 'caller');
    const call = this.normalizeCall(input);

    return this.store.transaction((state) => {
      if (!this.roles.hasRole(Roles.proposer, sender)) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is missing the proposer role.', { caller: sender });
      }

      const minDelay = Math.max(state.timelock.minDelay, this.delayFloor);
      if (!Number.isInteger(input.delay) || input.delay < minDelay) {
        throw domainError(ErrorCode.InvalidArgument, 'Delay is below the minimum delay.', {
          delay: input.delay,
          minDelay,
        });
      }
      if (input.delay > MAX_DELAY_SECONDS) {
        throw domainError(ErrorCode.InvalidArgument, 'Delay exceeds the maximum delay.', {
          delay: input.delay,
          maxDelay: MAX_DELAY_SECONDS,
        });
      }

      const id = hashOperation(call);
      const existing = state.timelock.operations[id];
      if (existing) {
        throw domainError(ErrorCode.AlreadyScheduled, 'Operation is already scheduled.', {
          operationId: id,
          done: existing.done,
        });
      }

      const now = this.clock.now();
      const operation: ScheduledOperation = {
        id,
        target: call.target,
        value: call.value.toString(),
        data: call.data,
        predecessor: call.predecessor,
        salt: call.salt,
        delay: input.delay,
        scheduledAt: now,
        readyTimestamp: now + input.delay,
        done: false,
      };
      const metadata: OperationMetadata = {
        description: input.description ?? '',
        category: input.category ?? 'other',
      };

      state.timelock.operations[id] = operation;
      state.timelock.metadata[id] = metadata;

      this.publisher.publish('operation.queued', {
        operationId: id,
        category: metadata.category,
        description: metadata.description,
        delay: input.delay,
        readyTimestamp: operation.readyTimestamp,
      });

      return this.toView(state, operation, now);
    });
  }

  // ─── Execution ──────────────────────────────────────────────────────

  /**
   * Run a ready operation. The call and the Done marking commit together; if the
   * call fails the operation stays pending.
   */
  async execute(caller: Address, input: OperationCallInput): Promise<OperationView> {
    const sender = toAccount(caller, 'caller');
    const call = this.normalizeCall(input);

    return this.store.transaction(async (state) => {
      if (!this.roles.hasRoleOrOpen(Roles.executor, sender)) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is missing the executor role.', { caller: sender });
      }

      const id = hashOperation(call);
      const operation = state.timelock.operations[id];
      if (!operation) {
        throw domainError(ErrorCode.OperationNotFound, 'Operation is not scheduled.', { operationId: id });
      }
      if (operation.done) {
        throw domainError(ErrorCode.AlreadyDone, 'Operation has already been executed.', { operationId: id });
      }

      const now = this.clock.now();
      if (now < operation.readyTimestamp) {
        throw domainError(ErrorCode.NotReady, 'Operation is not ready yet.', {
          operationId: id,
          readyTimestamp: operation.readyTimestamp,
          now,
        });
      }
      if (call.predecessor !== zeroHash && !state.timelock.operations[call.predecessor]?.done) {
        throw domainError(ErrorCode.PredecessorNotDone, 'Predecessor operation is not done.', {
          operationId: id,
          predecessor: call.predecessor,
        });
      }

      try {
        if (call.value > 0n) {
          await this.native.transfer(this.address, call.target, call.value);
        }
        await this.router.dispatch(this.address, call.target, call.value, call.data);
      } catch (error) {
        throw domainError(ErrorCode.ExternalActionFailure, 'Underlying call failed.', {
          operationId: id,
          target: call.target,
          reason: error instanceof DomainError ? error.code : 'unexpected',
          message: error instanceof Error ? error.message : String(error),
          ...(error instanceof DomainError && error.details ? { cause: error.details } : {}),
        });
      }

      const metadata: OperationMetadata = state.timelock.metadata[id] ?? { description: '', category: 'other' };
      operation.done = true;
      operation.executedAt = now;
      delete state.timelock.metadata[id];

      this.publisher.publish('operation.executed', {
        operationId: id,
        category: metadata.category,
        description: metadata.description,
      });

      return this.toView(state, operation, now);
    });
  }

  async cancel(caller: Address, operationId: Hex): Promise<void> {
    const sender = toAccount(caller, 'caller');

    await this.store.transaction((state) => {
      if (!this.roles.hasRole(Roles.canceller, sender)) {
        throw domainError(ErrorCode.Unauthorized, 'Caller is missing the canceller role.', { caller: sender });
      }

      const operation = state.timelock.operations[operationId];
      if (!operation) {
        throw domainError(ErrorCode.OperationNotFound, 'Operation is not scheduled.', { operationId });
      }
      if (operation.done) {
        throw domainError(ErrorCode.AlreadyDone, 'Operation has already been executed.', { operationId });
      }

      const metadata = state.timelock.metadata[operationId];
      delete state.timelock.operations[operationId];
      delete state.timelock.metadata[operationId];

      this.publisher.publish('operation.cancelled', {
        operationId,
        category: metadata?.category ?? 'other',
        description: metadata?.description ?? '',
      });
    });
  }

  // ─── Self-calls ─────────────────────────────────────────────────────

  async updateDelay(caller: Address, newDelay: number): Promise<void> {
    const sender = toAccount(caller, 'caller');
    if (sender !== this.address) {
      throw domainError(ErrorCode.Unauthorized, 'Delay can only be changed through a scheduled operation.', {
        caller: sender,
      });
    }

    await this.store.transaction((state) => {
      this.assertDelayBounds(newDelay);
      const previous = state.timelock.minDelay;
      state.timelock.minDelay = newDelay;
      this.publisher.publish('timelock.delay.updated', { previous, next: newDelay });
    });
  }

  async handleCall(call: ContractCall): Promise<void> {
    if (call.caller !== this.address) {
      throw domainError(ErrorCode.Unauthorized, 'Queue functions can only be called by the queue itself.', {
        caller: call.caller,
      });
    }

    let decoded: DecodeFunctionDataReturnType<typeof TimelockAbi>;
    try {
      decoded = decodeFunctionData({ abi: TimelockAbi, data: call.data });
    } catch {
      throw domainError(ErrorCode.ExternalActionFailure, 'Queue does not implement the called function.', {
        data: call.data,
      });
    }

    switch (decoded.functionName) {
      case 'updateDelay': {
        const [newDelay] = decoded.args;
        await this.updateDelay(call.caller, newDelay > BigInt(MAX_DELAY_SECONDS) ? Number.MAX_SAFE_INTEGER : Number(newDelay));
        return;
      }
      case 'grantRole': {
        const [role, account] = decoded.args;
        await this.roles.grantRole(call.caller, role, account);
        return;
      }
      case 'revokeRole': {
        const [role, account] = decoded.args;
        await this.roles.revokeRole(call.caller, role, account);
        return;
      }
    }
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getOperation(operationId: Hex): OperationView | null {
    const now = this.clock.now();
    return this.store.view((state) => {
      const operation = state.timelock.operations[operationId];
      return operation ? this.toView(state, operation, now) : null;
    });
  }

  /** Ready timestamp of a known operation, 0 when unknown. */
  getTimestamp(operationId: Hex): number {
    return this.store.view((state) => state.timelock.operations[operationId]?.readyTimestamp ?? 0);
  }

  isOperationPending(operationId: Hex): boolean {
    const state = this.getOperation(operationId)?.state;
    return state === 'waiting' || state === 'ready';
  }

  isOperationReady(operationId: Hex): boolean {
    return this.getOperation(operationId)?.state === 'ready';
  }

  isOperationDone(operationId: Hex): boolean {
    return this.getOperation(operationId)?.state === 'done';
  }

  listOperations(stateFilter?: OperationState): OperationView[] {
    const now = this.clock.now();
    return this.store.view((state) => Object.values(state.timelock.operations)
      .map((operation) => this.toView(state, operation, now))
      .filter((view) => !stateFilter || view.state === stateFilter)
      .sort((a, b) => a.readyTimestamp - b.readyTimestamp));
  }

  listPending(): OperationView[] {
    return this.listOperations().filter((view) => view.state !== 'done');
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private normalizeCall(input: OperationCallInput): OperationCall {
    const call: OperationCall = {
      target: toAccount(input.target, 'target'),
      value: input.value ?? 0n,
      data: input.data ?? '0x',
      predecessor: input.predecessor ?? zeroHash,
      salt: input.salt ?? zeroHash,
    };

    if (call.value < 0n) {
      throw domainError(ErrorCode.InvalidArgument, 'Value must not be negative.');
    }
    if (call.value > maxUint256) {
      throw domainError(ErrorCode.InvalidArgument, 'Value exceeds uint256.', { value: call.value.toString() });
    }
    if (!isHex(call.data, { strict: true })) {
      throw domainError(ErrorCode.InvalidArgument, 'Call data must be hex encoded.', { data: call.data });
    }
    if (!isBytes32(call.predecessor)) {
      throw domainError(ErrorCode.InvalidArgument, 'Predecessor must be a 32-byte hash.', {
        predecessor: call.predecessor,
      });
    }
    if (!isBytes32(call.salt)) {
      throw domainError(ErrorCode.InvalidArgument, 'Salt must be 32 bytes.', { salt: call.salt });
    }
    return call;
  }

  private assertDelayBounds(delay: number): void {
    if (!Number.isInteger(delay) || delay < this.delayFloor || delay > MAX_DELAY_SECONDS) {
      throw domainError(ErrorCode.InvalidArgument, 'Delay is outside the allowed range for this network.', {
        delay,
        floor: this.delayFloor,
        maxDelay: MAX_DELAY_SECONDS,
      });
    }
  }

  private toView(state: AppState, operation: ScheduledOperation, now: number): OperationView {
    let opState: OperationState = 'waiting';
    if (operation.done) opState = 'done';
    else if (now >= operation.readyTimestamp) opState = 'ready';

    return {
      ...structuredClone(operation),
      state: opState,
      metadata: state.timelock.metadata[operation.id] ? { ...state.timelock.metadata[operation.id] } : null,
    };
  }
}
