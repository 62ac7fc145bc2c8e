import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { LedgerState } from '../../domain/governance/governanceTypes.js';
import { isNullIdentity, normalizeIdentity } from '../../domain/governance/identity.js';
import { createDefaultState } from './defaultState.js';

const proposalSchema = z.object({
  id: z.number().int().nonnegative(),
  title: z.string().min(1),
  description: z.string().min(1),
  yesCount: z.number().int().nonnegative(),
  noCount: z.number().int().nonnegative(),
  active: z.boolean(),
  createdAt: z.number().int().nonnegative(),
  creator: z.string().transform(normalizeIdentity),
});

const ledgerStateSchema = z.object({
  administrator: z.string()
    .refine((value) => !isNullIdentity(value), 'administrator must not be the null address')
    .transform(normalizeIdentity),
  proposals: z.array(proposalSchema)
    .refine(
      (proposals) => proposals.every((proposal, index) => proposal.id === index),
      'proposal ids must be sequential from 0',
    ),
  voteRecords: z.record(z.string(), z.literal(true)),
});

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export class StateStore {
  private state: LedgerState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    administrator: string,
  ) {
    this.state = createDefaultState(administrator);
  }

  /**
   * Load the ledger from disk. A missing file starts a fresh ledger; a file
   * that does not parse is an error and is left untouched.
   */
  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      await this.persist();
      return;
    }

    const parsed = ledgerStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Ledger state file ${this.stateFilePath} is invalid: ${parsed.error.message}`);
    }
    this.state = parsed.data;
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  /**
   * Run `work` against a draft of the state with no other transaction
   * interleaved. The draft replaces the live state only after it has been
   * written to disk; if `work` throws or the write fails, nothing changes.
   */
  async transaction<T>(work: (state: LedgerState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      await this.persist(draft);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(state: LedgerState = this.state): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}
