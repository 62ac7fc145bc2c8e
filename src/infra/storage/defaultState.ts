import { LedgerState } from '../../domain/governance/governanceTypes.js';
import { normalizeIdentity } from '../../domain/governance/identity.js';

export const createDefaultState = (administrator: string): LedgerState => ({
  administrator: normalizeIdentity(administrator),
  proposals: [],
  voteRecords: {},
});
