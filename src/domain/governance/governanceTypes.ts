/**
 * Governance ledger types.
 *
 * Proposals are addressed by a sequential 0-based id. Each account address
 * may vote once per proposal; only the administrator creates and closes.
 */

export interface Proposal {
  id: number;
  title: string;
  description: string;
  yesCount: number;
  noCount: number;
  /** Once false, never true again. */
  active: boolean;
  /** Seconds since epoch. */
  createdAt: number;
  creator: string;
}

export type ProposalInfo = Pick<Proposal, 'title' | 'description' | 'yesCount' | 'noCount' | 'active'>;

/** Both values are scaled by 10000, so 10000 == 100.00%. */
export interface VotePercentages {
  yesPct: number;
  noPct: number;
}

export interface LedgerState {
  administrator: string;
  /** Index == proposal id. */
  proposals: Proposal[];
  /** Keyed by `${proposalId}:${voter}`. */
  voteRecords: Record<string, true>;
}

// ─── Notifications ──────────────────────────────────────────────────────────

export interface ProposalCreatedEvent {
  id: number;
  title: string;
  creator: string;
  timestamp: number;
}

export interface VotedEvent {
  voter: string;
  id: number;
  support: boolean;
  timestamp: number;
}

export interface ProposalClosedEvent {
  id: number;
  yesCount: number;
  noCount: number;
  timestamp: number;
}

export interface AdministratorTransferredEvent {
  previous: string;
  next: string;
  timestamp: number;
}

export interface LedgerEventMap {
  'proposal.created': ProposalCreatedEvent;
  'proposal.voted': VotedEvent;
  'proposal.closed': ProposalClosedEvent;
  'admin.transferred': AdministratorTransferredEvent;
}

export type LedgerEventType = keyof LedgerEventMap;

export interface LedgerEventSink {
  emit<K extends LedgerEventType>(event: K, data: LedgerEventMap[K]): void;
}
