export const ZERO_ADDRESS = `0x${'0'.repeat(40)}`;

/** Account address as the HTTP layer accepts it. */
export const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const normalizeIdentity = (input: string): string => input.trim().toLowerCase();

export const isNullIdentity = (input: string): boolean => {
  const identity = normalizeIdentity(input);
  return identity === '' || identity === ZERO_ADDRESS;
};

export const voteRecordKey = (proposalId: number, voter: string): string => (
  `${proposalId}:${normalizeIdentity(voter)}`
);
