export const ErrorCode = {
  InvalidInput: 'invalid_input',
  NotFound: 'proposal_not_found',
  Inactive: 'proposal_inactive',
  AlreadyClosed: 'proposal_already_closed',
  DuplicateVote: 'duplicate_vote',
  Unauthorized: 'unauthorized',
  MissingCaller: 'missing_caller',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
