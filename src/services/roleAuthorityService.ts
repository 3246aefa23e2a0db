/**
 * Role registry queried by every privileged entry point.
 *
 * Admin members grant and revoke the other roles. Executor held by the zero
 * address opens execution to everyone.
 */

import { zeroAddress, type Address, type Hex } from 'viem';
import { Roles } from '../domain/access/roles.js';
import { domainError, ErrorCode } from '../errors/taxonomy.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransitionPublisher } from '../infra/transitions.js';
import { AppState } from '../types.js';
import { toAccount } from '../utils/address.js';

export class RoleAuthorityService {
  constructor(
    private readonly store: StateStore,
    private readonly publisher: TransitionPublisher,
  ) {}

  hasRole(role: Hex, account: Address): boolean {
    const member = toAccount(account);
    return this.store.view((state) => (state.roles.members[role] ?? []).includes(member));
  }

  /**
   * True when the account holds the role or the role is open to everyone.
   */
  hasRoleOrOpen(role: Hex, account: Address): boolean {
    return this.hasRole(role, zeroAddress) || this.hasRole(role, account);
  }

  members(role: Hex): Address[] {
    return this.store.view((state) => [...(state.roles.members[role] ?? [])]);
  }

  /**
   * Seed the first admin. Only possible while no admin exists.
   */
  async initializeAdmin(account: Address): Promise<void> {
    const admin = toAccount(account);
    await this.store.transaction((state) => {
      if ((state.roles.members[Roles.admin] ?? []).length > 0) {
        throw domainError(ErrorCode.AuthorityLocked, 'Admin role is already initialized.');
      }
      this.addMember(state, Roles.admin, admin, admin);
    });
  }

  async grantRole(caller: Address, role: Hex, account: Address): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const member = toAccount(account);
    await this.store.transaction((state) => {
      this.assertAdmin(state, sender);
      this.addMember(state, role, member, sender);
    });
  }

  async revokeRole(caller: Address, role: Hex, account: Address): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const member = toAccount(account);
    await this.store.transaction((state) => {
      this.assertAdmin(state, sender);
      this.removeMember(state, role, member, sender);
    });
  }

  async renounceRole(caller: Address, role: Hex, account: Address): Promise<void> {
    const sender = toAccount(caller, 'caller');
    const member = toAccount(account);
    if (sender !== member) {
      throw domainError(ErrorCode.Unauthorized, 'Roles can only be renounced by their holder.');
    }
    await this.store.transaction((state) => {
      this.removeMember(state, role, member, sender);
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private assertAdmin(state: AppState, account: Address): void {
    if (!(state.roles.members[Roles.admin] ?? []).includes(account)) {
      throw domainError(ErrorCode.Unauthorized, 'Caller is missing the admin role.', { caller: account });
    }
  }

  private addMember(state: AppState, role: Hex, account: Address, sender: Address): void {
    const current = state.roles.members[role] ?? [];
    if (current.includes(account)) return;
    state.roles.members[role] = [...current, account];
    this.publisher.publish('role.granted', { role, account, sender });
  }

  private removeMember(state: AppState, role: Hex, account: Address, sender: Address): void {
    const current = state.roles.members[role] ?? [];
    if (!current.includes(account)) return;
    state.roles.members[role] = current.filter((member) => member !== account);
    this.publisher.publish('role.revoked', { role, account, sender });
  }
}
