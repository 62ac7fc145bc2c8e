// Governance Ledger API — SDK entry point
export { GovernanceAPIClient, GovernanceAPIError } from './client.js';
export type { GovernanceAPIClientOptions } from './client.js';
export type {
  ProposalStatusFilter,

  // Proposals
  Proposal,
  CreateProposalOpts,
  CreateProposalResponse,
  ProposalIdsResponse,

  // Votes & tally
  VoteReceipt,
  HasVotedResponse,
  VotePercentages,
  ProposalResult,

  // System
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
