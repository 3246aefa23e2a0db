/**
 * Delayed execution queue types.
 *
 * An operation is identified by the hash of its call, so the same call can be
 * queued again under a different salt.
 */

import type { Address, Hex } from 'viem';

export const OPERATION_CATEGORIES = [
  'proposal_execution',
  'parameter_change',
  'treasury',
  'token',
  'role_admin',
  'other',
] as const;

export type OperationCategory = (typeof OPERATION_CATEGORIES)[number];

export type LedgerNetwork = 'mainnet' | 'testnet';

/** Unset ids are simply absent from the table. */
export type OperationState = 'waiting' | 'ready' | 'done';

export interface OperationCall {
  target: Address;
  value: bigint;
  data: Hex;
  predecessor: Hex;
  salt: Hex;
}

export interface ScheduledOperation {
  id: Hex;
  target: Address;
  value: string; // bigint as string
  data: Hex;
  predecessor: Hex;
  salt: Hex;
  delay: number;
  scheduledAt: number;
  readyTimestamp: number;
  done: boolean;
  executedAt?: number;
}

export interface OperationMetadata {
  description: string;
  category: OperationCategory;
}

export interface OperationView extends ScheduledOperation {
  state: OperationState;
  metadata: OperationMetadata | null;
}

export interface TimelockState {
  minDelay: number;
  operations: Record<Hex, ScheduledOperation>;
  metadata: Record<Hex, OperationMetadata>;
}
