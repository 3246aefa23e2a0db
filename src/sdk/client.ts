// ─── GovernanceClient ──────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the governance engine API.
// Works in Node.js 20+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  AccountBalances,
  APIErrorEnvelope,
  CreateProposalInput,
  ExecutionCall,
  HealthResponse,
  Operation,
  OperationCallInput,
  OperationState,
  Proposal,
  ProposalStatus,
  QuorumProgress,
  RoleMembers,
  RoleName,
  ScheduleInput,
  TimelockInfo,
  VoteReceipt,
  VoterEligibility,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Ledger account sent as `x-account` on write calls. */
  account?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

export class GovernanceClient {
  private readonly baseUrl: string;
  private readonly account?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, account?: string);
  constructor(opts: GovernanceClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceClientOptions, account?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.account = account;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.account = baseUrlOrOpts.account;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** A client acting as another ledger account. */
  as(account: string): GovernanceClient {
    return new GovernanceClient({ baseUrl: this.baseUrl, account, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.account) h['x-account'] = this.account;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: APIErrorEnvelope | undefined;
      try {
        errorBody = (await res.json()) as APIErrorEnvelope;
      } catch {
        // response body may not be JSON
      }
      throw new GovernanceAPIError(
        res.status,
        errorBody?.error?.code ?? `HTTP_${res.status}`,
        errorBody?.error?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        errorBody?.error?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body ?? {});
  }

  // ─── Proposals ─────────────────────────────────────────────────────────

  async createProposal(input: CreateProposalInput): Promise<Proposal> {
    return this.post<Proposal>('/proposals', input);
  }

  /** List proposals, newest first. */
  async listProposals(status?: ProposalStatus): Promise<Proposal[]> {
    const qs = status ? `?status=${encodeURIComponent(status)}` : '';
    const result = await this.get<{ proposals: Proposal[] }>(`/proposals${qs}`);
    return result.proposals;
  }

  async listActiveProposals(): Promise<Proposal[]> {
    const result = await this.get<{ proposals: Proposal[] }>('/proposals/active');
    return result.proposals;
  }

  async getProposal(proposalId: number): Promise<Proposal> {
    return this.get<Proposal>(`/proposals/${proposalId}`);
  }

  async getQuorumProgress(proposalId: number): Promise<QuorumProgress> {
    return this.get<QuorumProgress>(`/proposals/${proposalId}/quorum`);
  }

  async getEligibility(proposalId: number, account: string): Promise<VoterEligibility> {
    return this.get<VoterEligibility>(`/proposals/${proposalId}/eligibility/${encodeURIComponent(account)}`);
  }

  async getVoteReceipt(proposalId: number, account: string): Promise<VoteReceipt | null> {
    const result = await this.get<{ receipt: VoteReceipt | null }>(
      `/proposals/${proposalId}/votes/${encodeURIComponent(account)}`,
    );
    return result.receipt;
  }

  /** The queue call that executes the proposal once scheduled. */
  async getExecutionCall(proposalId: number): Promise<ExecutionCall> {
    return this.get<ExecutionCall>(`/proposals/${proposalId}/execution-call`);
  }

  async castVote(proposalId: number, support: boolean): Promise<VoteReceipt> {
    return this.post<VoteReceipt>(`/proposals/${proposalId}/votes`, { support });
  }

  async finalize(proposalId: number): Promise<Proposal> {
    return this.post<Proposal>(`/proposals/${proposalId}/finalize`);
  }

  async executeProposal(proposalId: number): Promise<Proposal> {
    return this.post<Proposal>(`/proposals/${proposalId}/execute`);
  }

  // ─── Execution queue ───────────────────────────────────────────────────

  async getTimelock(): Promise<TimelockInfo> {
    return this.get<TimelockInfo>('/timelock');
  }

  async hashOperation(call: OperationCallInput): Promise<string> {
    const result = await this.post<{ operationId: string }>('/timelock/hash', call);
    return result.operationId;
  }

  async schedule(input: ScheduleInput): Promise<Operation> {
    return this.post<Operation>('/timelock/schedule', input);
  }

  async executeOperation(call: OperationCallInput): Promise<Operation> {
    return this.post<Operation>('/timelock/execute', call);
  }

  async cancelOperation(operationId: string): Promise<void> {
    await this.post(`/timelock/operations/${encodeURIComponent(operationId)}/cancel`);
  }

  async listOperations(state?: OperationState): Promise<Operation[]> {
    const qs = state ? `?state=${encodeURIComponent(state)}` : '';
    const result = await this.get<{ operations: Operation[] }>(`/timelock/operations${qs}`);
    return result.operations;
  }

  async getOperation(operationId: string): Promise<Operation> {
    return this.get<Operation>(`/timelock/operations/${encodeURIComponent(operationId)}`);
  }

  // ─── Roles & balances ──────────────────────────────────────────────────

  async getRoleMembers(role: RoleName): Promise<string[]> {
    const result = await this.get<RoleMembers>(`/roles/${role}/members`);
    return result.members;
  }

  async getBalances(account: string): Promise<AccountBalances> {
    return this.get<AccountBalances>(`/token/${encodeURIComponent(account)}`);
  }

  // ─── System ───────────────────────────────────────────────────────────

  /** Health check. */
  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }
}
