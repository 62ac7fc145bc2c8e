// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the Governance Ledger API SDK.
// These mirror the API responses but are decoupled from internal server types.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalStatusFilter = 'all' | 'active';

// ─── Proposals ─────────────────────────────────────────────────────────────

export interface Proposal {
  id: number;
  title: string;
  description: string;
  yesCount: number;
  noCount: number;
  active: boolean;
  /** Seconds since epoch. */
  createdAt: number;
  creator: string;
}

export interface CreateProposalOpts {
  title: string;
  description: string;
}

export interface CreateProposalResponse {
  id: number;
  proposal: Proposal;
}

export interface ProposalIdsResponse {
  status: ProposalStatusFilter;
  ids: number[];
}

// ─── Votes & tally ─────────────────────────────────────────────────────────

export interface VoteReceipt {
  proposalId: number;
  voter: string;
  support: boolean;
  yesCount: number;
  noCount: number;
}

export interface HasVotedResponse {
  proposalId: number;
  voter: string;
  hasVoted: boolean;
}

/** Scaled by 10000: 5000 == 50.00%. */
export interface VotePercentages {
  proposalId: number;
  yesPct: number;
  noPct: number;
}

export interface ProposalResult {
  proposalId: number;
  approved: boolean;
  yesCount: number;
  noCount: number;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  env: string;
  uptimeSeconds: number;
  processPid: number;
  wsClients: number;
  ledger: {
    proposalCount: number;
    activeProposals: number;
    administrator: string;
  };
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
