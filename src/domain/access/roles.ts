import { keccak256, toBytes, type Address, type Hex } from 'viem';

export const ROLE_NAMES = ['admin', 'proposer', 'executor', 'canceller'] as const;

export type RoleName = (typeof ROLE_NAMES)[number];

export function isRoleName(value: string): value is RoleName {
  return (ROLE_NAMES as readonly string[]).includes(value);
}

export const Roles: Record<RoleName, Hex> = {
  admin: keccak256(toBytes('ADMIN_ROLE')),
  proposer: keccak256(toBytes('PROPOSER_ROLE')),
  executor: keccak256(toBytes('EXECUTOR_ROLE')),
  canceller: keccak256(toBytes('CANCELLER_ROLE')),
};

export interface RoleState {
  /** role id → members, in grant order. */
  members: Record<Hex, Address[]>;
}
