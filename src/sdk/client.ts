// ─── GovernanceAPIClient ───────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the Governance Ledger API.
// Works in Node.js 18+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  CreateProposalOpts,
  CreateProposalResponse,
  HasVotedResponse,
  HealthResponse,
  Proposal,
  ProposalIdsResponse,
  ProposalResult,
  ProposalStatusFilter,
  VotePercentages,
  VoteReceipt,
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

export interface GovernanceAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Account address sent as the caller of state-changing requests. */
  callerAddress?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (body: unknown): body is APIErrorEnvelope => {
  if (typeof body !== 'object' || body === null || !('error' in body)) return false;
  const { error } = body;
  return typeof error === 'object' && error !== null
    && 'code' in error && typeof error.code === 'string'
    && 'message' in error && typeof error.message === 'string';
};

export class GovernanceAPIClient {
  private readonly baseUrl: string;
  private readonly callerAddress?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, callerAddress?: string);
  constructor(opts: GovernanceAPIClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceAPIClientOptions, callerAddress?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.callerAddress = callerAddress;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.callerAddress = baseUrlOrOpts.callerAddress;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.callerAddress) h['x-caller-address'] = this.callerAddress;
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
      // Non-JSON error bodies fall back to the HTTP status.
      const errorBody: unknown = await res.json().catch(() => undefined);
      const envelope = isErrorEnvelope(errorBody) ? errorBody : undefined;
      throw new GovernanceAPIError(
        res.status,
        envelope?.error.code ?? `HTTP_${res.status}`,
        envelope?.error.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.error.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  // ─── Administration ────────────────────────────────────────────────────

  /** Current administrator address. */
  async getAdministrator(): Promise<string> {
    const result = await this.get<{ administrator: string }>('/governance/admin');
    return result.administrator;
  }

  /**
   * Hand the administrator role to `newAdmin`.
   * The client's caller address must be the current administrator.
   */
  async transferAdministrator(newAdmin: string): Promise<string> {
    const result = await this.post<{ administrator: string }>('/governance/admin/transfer', { newAdmin });
    return result.administrator;
  }

  // ─── Proposals ─────────────────────────────────────────────────────────

  async listProposalIds(status: ProposalStatusFilter = 'all'): Promise<number[]> {
    const result = await this.get<ProposalIdsResponse>(`/proposals?status=${status}`);
    return result.ids;
  }

  async getProposalCount(): Promise<number> {
    const result = await this.get<{ count: number }>('/proposals/count');
    return result.count;
  }

  async getProposal(proposalId: number): Promise<Proposal> {
    return this.get<Proposal>(`/proposals/${proposalId}`);
  }

  async createProposal(opts: CreateProposalOpts): Promise<CreateProposalResponse> {
    return this.post<CreateProposalResponse>('/proposals', opts);
  }

  async closeProposal(proposalId: number): Promise<Proposal> {
    const result = await this.post<{ proposal: Proposal }>(`/proposals/${proposalId}/close`, {});
    return result.proposal;
  }

  // ─── Voting ────────────────────────────────────────────────────────────

  /** Vote as the client's caller address. */
  async vote(proposalId: number, support: boolean): Promise<VoteReceipt> {
    return this.post<VoteReceipt>(`/proposals/${proposalId}/votes`, { support });
  }

  async hasVoted(proposalId: number, voter: string): Promise<boolean> {
    const result = await this.get<HasVotedResponse>(
      `/proposals/${proposalId}/votes/${encodeURIComponent(voter)}`,
    );
    return result.hasVoted;
  }

  async getVotePercentages(proposalId: number): Promise<VotePercentages> {
    return this.get<VotePercentages>(`/proposals/${proposalId}/percentages`);
  }

  async getProposalResult(proposalId: number): Promise<ProposalResult> {
    return this.get<ProposalResult>(`/proposals/${proposalId}/result`);
  }

  // ─── System ───────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }
}
