/**
 * Proposal / vote state machine.
 *
 * Every mutating method validates existence, lifecycle, authorization and
 * vote uniqueness before it touches `state`, so a thrown DomainError leaves
 * the state exactly as it was. The class is synchronous; callers that share
 * one state between concurrent requests serialize them (see StateStore).
 */

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import {
  LedgerEventSink,
  LedgerState,
  Proposal,
  ProposalInfo,
  VotePercentages,
} from './governanceTypes.js';
import { isNullIdentity, normalizeIdentity, voteRecordKey } from './identity.js';
import { isApproved, votePercentages } from './tally.js';

export class GovernanceLedger {
  constructor(
    private readonly state: LedgerState,
    private readonly events?: LedgerEventSink,
  ) {}

  // ─── Access controller ──────────────────────────────────────────────

  getAdministrator(): string {
    return this.state.administrator;
  }

  isAdministrator(identity: string): boolean {
    return normalizeIdentity(identity) === this.state.administrator;
  }

  transferAdministrator(newAdmin: string, caller: string, now: number): void {
    this.requireAdministrator(caller, 'transfer the administrator role');

    if (isNullIdentity(newAdmin)) {
      throw new DomainError(ErrorCode.InvalidInput, 400, 'New administrator must not be the null address.');
    }

    const previous = this.state.administrator;
    this.state.administrator = normalizeIdentity(newAdmin);

    this.events?.emit('admin.transferred', {
      previous,
      next: this.state.administrator,
      timestamp: now,
    });
  }

  // ─── Proposal store ─────────────────────────────────────────────────

  createProposal(title: string, description: string, creator: string, now: number): number {
    this.requireAdministrator(creator, 'create proposals');

    const cleanTitle = title.trim();
    const cleanDescription = description.trim();
    if (!cleanTitle || !cleanDescription) {
      throw new DomainError(ErrorCode.InvalidInput, 400, 'Title and description must not be empty.', {
        titleEmpty: !cleanTitle,
        descriptionEmpty: !cleanDescription,
      });
    }

    const proposal: Proposal = {
      id: this.state.proposals.length,
      title: cleanTitle,
      description: cleanDescription,
      yesCount: 0,
      noCount: 0,
      active: true,
      createdAt: now,
      creator: normalizeIdentity(creator),
    };

    this.state.proposals.push(proposal);

    this.events?.emit('proposal.created', {
      id: proposal.id,
      title: proposal.title,
      creator: proposal.creator,
      timestamp: now,
    });

    return proposal.id;
  }

  closeProposal(proposalId: number, caller: string, now: number): void {
    const proposal = this.requireProposal(proposalId);
    this.requireAdministrator(caller, 'close proposals');

    if (!proposal.active) {
      throw new DomainError(ErrorCode.AlreadyClosed, 409, `Proposal ${proposalId} is already closed.`, {
        proposalId,
      });
    }

    proposal.active = false;

    this.events?.emit('proposal.closed', {
      id: proposal.id,
      yesCount: proposal.yesCount,
      noCount: proposal.noCount,
      timestamp: now,
    });
  }

  // ─── Vote ledger ────────────────────────────────────────────────────

  castVote(proposalId: number, voter: string, support: boolean, now: number): void {
    const proposal = this.requireProposal(proposalId);

    if (!proposal.active) {
      throw new DomainError(ErrorCode.Inactive, 409, `Proposal ${proposalId} is closed, voting is over.`, {
        proposalId,
      });
    }

    if (isNullIdentity(voter)) {
      throw new DomainError(ErrorCode.InvalidInput, 400, 'Voter must not be the null address.');
    }

    const key = voteRecordKey(proposalId, voter);
    if (this.state.voteRecords[key]) {
      throw new DomainError(ErrorCode.DuplicateVote, 409, 'Address has already voted on this proposal.', {
        proposalId,
        voter: normalizeIdentity(voter),
      });
    }

    this.state.voteRecords[key] = true;
    if (support) {
      proposal.yesCount += 1;
    } else {
      proposal.noCount += 1;
    }

    this.events?.emit('proposal.voted', {
      voter: normalizeIdentity(voter),
      id: proposalId,
      support,
      timestamp: now,
    });
  }

  hasVoted(proposalId: number, voter: string): boolean {
    this.requireProposal(proposalId);
    return this.state.voteRecords[voteRecordKey(proposalId, voter)] === true;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getProposalCount(): number {
    return this.state.proposals.length;
  }

  getProposal(proposalId: number): Proposal {
    return { ...this.requireProposal(proposalId) };
  }

  getProposalInfo(proposalId: number): ProposalInfo {
    const { title, description, yesCount, noCount, active } = this.requireProposal(proposalId);
    return { title, description, yesCount, noCount, active };
  }

  getAllProposalIds(): number[] {
    return this.state.proposals.map((proposal) => proposal.id);
  }

  getActiveProposalIds(): number[] {
    return this.state.proposals
      .filter((proposal) => proposal.active)
      .map((proposal) => proposal.id);
  }

  getVotePercentages(proposalId: number): VotePercentages {
    const proposal = this.requireProposal(proposalId);
    return votePercentages(proposal.yesCount, proposal.noCount);
  }

  getProposalResult(proposalId: number): boolean {
    const proposal = this.requireProposal(proposalId);
    return isApproved(proposal.yesCount, proposal.noCount);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private requireProposal(proposalId: number): Proposal {
    const proposal = Number.isInteger(proposalId) ? this.state.proposals[proposalId] : undefined;
    if (!proposal) {
      throw new DomainError(ErrorCode.NotFound, 404, `Proposal ${proposalId} not found.`, {
        proposalId,
        proposalCount: this.state.proposals.length,
      });
    }
    return proposal;
  }

  private requireAdministrator(caller: string, action: string): void {
    if (!this.isAdministrator(caller)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, `Only the administrator may ${action}.`);
    }
  }
}
