export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidArgument: 'invalid_argument',
  FutureLookup: 'future_lookup',
  Unauthorized: 'unauthorized',
  ProposalNotFound: 'proposal_not_found',
  OperationNotFound: 'operation_not_found',
  AlreadyVoted: 'already_voted',
  NotActive: 'not_active',
  VotingNotEnded: 'voting_not_ended',
  NoVotingPower: 'no_voting_power',
  NotPassed: 'not_passed',
  AlreadyExecuted: 'already_executed',
  AuthorityLocked: 'authority_locked',
  AlreadyScheduled: 'already_scheduled',
  NotReady: 'not_ready',
  PredecessorNotDone: 'predecessor_not_done',
  AlreadyDone: 'already_done',
  ExternalActionFailure: 'external_action_failure',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type ErrorCategory =
  | 'invalid_argument'
  | 'unauthorized'
  | 'not_found'
  | 'invalid_state'
  | 'external_action_failure'
  | 'internal';

const categoryByCode: Record<ErrorCode, ErrorCategory> = {
  invalid_payload: 'invalid_argument',
  invalid_argument: 'invalid_argument',
  future_lookup: 'invalid_argument',
  unauthorized: 'unauthorized',
  proposal_not_found: 'not_found',
  operation_not_found: 'not_found',
  already_voted: 'invalid_state',
  not_active: 'invalid_state',
  voting_not_ended: 'invalid_state',
  no_voting_power: 'invalid_state',
  not_passed: 'invalid_state',
  already_executed: 'invalid_state',
  authority_locked: 'invalid_state',
  already_scheduled: 'invalid_state',
  not_ready: 'invalid_state',
  predecessor_not_done: 'invalid_state',
  already_done: 'invalid_state',
  external_action_failure: 'external_action_failure',
  internal_error: 'internal',
};

const statusByCategory: Record<ErrorCategory, number> = {
  invalid_argument: 400,
  unauthorized: 403,
  not_found: 404,
  invalid_state: 409,
  external_action_failure: 422,
  internal: 500,
};

export const categoryOf = (code: ErrorCode): ErrorCategory => categoryByCode[code];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }

  get category(): ErrorCategory {
    return categoryOf(this.code);
  }
}

/**
 * Build a DomainError whose HTTP status follows from the code's category.
 */
export const domainError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): DomainError => new DomainError(code, statusByCategory[categoryOf(code)], message, details);

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
