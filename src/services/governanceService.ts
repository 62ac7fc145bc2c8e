/**
 * Governance service.
 *
 * Hosts the ledger state machine over the persisted state. Mutations run one
 * at a time inside a store transaction and are logged; queries read a
 * snapshot, so they never see a half-applied request.
 */

import { GovernanceLedger } from '../domain/governance/governanceLedger.js';
import {
  LedgerEventMap,
  LedgerEventSink,
  LedgerEventType,
  Proposal,
  ProposalInfo,
  VotePercentages,
} from '../domain/governance/governanceTypes.js';
import { normalizeIdentity } from '../domain/governance/identity.js';
import { DomainError } from '../errors/taxonomy.js';
import { EventLogger, LogLevel } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { unixNow } from '../utils/time.js';

export interface CreateProposalInput {
  title: string;
  description: string;
  caller: string;
}

export interface CastVoteInput {
  voter: string;
  support: boolean;
}

export interface VoteReceipt {
  proposalId: number;
  voter: string;
  support: boolean;
  yesCount: number;
  noCount: number;
}

export interface ProposalResult {
  proposalId: number;
  approved: boolean;
  yesCount: number;
  noCount: number;
}

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly events: LedgerEventSink,
    private readonly clock: () => number = unixNow,
  ) {}

  // ─── Mutations ──────────────────────────────────────────────────────

  async createProposal(input: CreateProposalInput): Promise<Proposal> {
    const proposal = await this.mutate('proposal.create', input.caller, (ledger, now) => {
      const id = ledger.createProposal(input.title, input.description, input.caller, now);
      return ledger.getProposal(id);
    });

    await this.record('info', 'proposal.created', {
      proposalId: proposal.id,
      creator: proposal.creator,
    });
    return proposal;
  }

  async castVote(proposalId: number, input: CastVoteInput): Promise<VoteReceipt> {
    const receipt = await this.mutate('proposal.vote', input.voter, (ledger, now) => {
      ledger.castVote(proposalId, input.voter, input.support, now);
      const { yesCount, noCount } = ledger.getProposalInfo(proposalId);
      return {
        proposalId,
        voter: normalizeIdentity(input.voter),
        support: input.support,
        yesCount,
        noCount,
      };
    });

    await this.record('info', 'vote.cast', {
      proposalId,
      voter: receipt.voter,
      support: receipt.support,
    });
    return receipt;
  }

  async closeProposal(proposalId: number, caller: string): Promise<Proposal> {
    const proposal = await this.mutate('proposal.close', caller, (ledger, now) => {
      ledger.closeProposal(proposalId, caller, now);
      return ledger.getProposal(proposalId);
    });

    await this.record('info', 'proposal.closed', {
      proposalId,
      yesCount: proposal.yesCount,
      noCount: proposal.noCount,
    });
    return proposal;
  }

  async transferAdministrator(newAdmin: string, caller: string): Promise<string> {
    const administrator = await this.mutate('admin.transfer', caller, (ledger, now) => {
      ledger.transferAdministrator(newAdmin, caller, now);
      return ledger.getAdministrator();
    });

    await this.record('info', 'admin.transferred', { administrator });
    return administrator;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getAdministrator(): string {
    return this.view().getAdministrator();
  }

  getProposalCount(): number {
    return this.view().getProposalCount();
  }

  getProposal(proposalId: number): Proposal {
    return this.view().getProposal(proposalId);
  }

  getProposalInfo(proposalId: number): ProposalInfo {
    return this.view().getProposalInfo(proposalId);
  }

  getAllProposalIds(): number[] {
    return this.view().getAllProposalIds();
  }

  getActiveProposalIds(): number[] {
    return this.view().getActiveProposalIds();
  }

  hasVoted(proposalId: number, voter: string): boolean {
    return this.view().hasVoted(proposalId, voter);
  }

  getVotePercentages(proposalId: number): VotePercentages {
    return this.view().getVotePercentages(proposalId);
  }

  getProposalResult(proposalId: number): ProposalResult {
    const ledger = this.view();
    const { yesCount, noCount } = ledger.getProposalInfo(proposalId);
    return {
      proposalId,
      approved: ledger.getProposalResult(proposalId),
      yesCount,
      noCount,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private view(): GovernanceLedger {
    return new GovernanceLedger(this.store.snapshot());
  }

  /**
   * Apply `work` in a store transaction. Ledger notifications are held until
   * the transaction commits, so a rejected or unpersisted request emits none.
   */
  private async mutate<T>(
    action: string,
    caller: string,
    work: (ledger: GovernanceLedger, now: number) => T,
  ): Promise<T> {
    const pending: Array<() => void> = [];
    const outbox: LedgerEventSink = {
      emit: <K extends LedgerEventType>(event: K, data: LedgerEventMap[K]) => {
        pending.push(() => this.events.emit(event, data));
      },
    };

    let result: T;
    try {
      result = await this.store.transaction((state) => work(new GovernanceLedger(state, outbox), this.clock()));
    } catch (error) {
      if (error instanceof DomainError) {
        await this.record('warn', 'request.rejected', {
          action,
          caller,
          code: error.code,
          message: error.message,
        });
      }
      throw error;
    }

    for (const deliver of pending) deliver();
    return result;
  }

  // A failed log write never changes the outcome of the request.
  private async record(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    await this.logger.log(level, event, data)
      .catch((logError: unknown) => console.error(logError));
  }
}
