/**
 * Error codes for clients to distinguish between error types.
 * Use these to provide intelligent error handling and user messaging.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  DATABASE_ERROR: 'DATABASE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Qualification (invalid input)
  INVALID_PARTICIPANTS: 'INVALID_PARTICIPANTS',
  INVALID_OUTCOME: 'INVALID_OUTCOME',
  INVALID_WINNER: 'INVALID_WINNER',
  UNKNOWN_PARTICIPANT: 'UNKNOWN_PARTICIPANT',

  // Qualification (illegal state)
  TOURNAMENT_NOT_FOUND: 'TOURNAMENT_NOT_FOUND',
  TOURNAMENT_ALREADY_COMPLETE: 'TOURNAMENT_ALREADY_COMPLETE',
  TOURNAMENT_NOT_COMPLETE: 'TOURNAMENT_NOT_COMPLETE',
  ROUND_NOT_COMPLETE: 'ROUND_NOT_COMPLETE',
  MATCH_ALREADY_RECORDED: 'MATCH_ALREADY_RECORDED',
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',

  // Bracket errors
  INVALID_BRACKET_SIZE: 'INVALID_BRACKET_SIZE',
  BRACKET_MATCH_NOT_FOUND: 'BRACKET_MATCH_NOT_FOUND',
  BRACKET_MATCH_NOT_READY: 'BRACKET_MATCH_NOT_READY',
  BRACKET_MATCH_DECIDED: 'BRACKET_MATCH_DECIDED',
  BRACKET_NOT_INITIALIZED: 'BRACKET_NOT_INITIALIZED',
  BRACKET_ALREADY_COMPLETE: 'BRACKET_ALREADY_COMPLETE',
  INSUFFICIENT_QUALIFIERS: 'INSUFFICIENT_QUALIFIERS',
  INVALID_PLAYOFF: 'INVALID_PLAYOFF',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when access is forbidden
 */
export class ForbiddenException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.FORBIDDEN) {
    super(message, 403, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when the requested transition is not allowed in the current state
 */
export class ConflictException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.CONFLICT) {
    super(message, 409, errorCode);
  }
}

/**
 * Thrown when a database operation fails or stored data cannot be read back.
 * Wraps the original error to prevent schema leakage.
 */
export class DatabaseException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 500, ErrorCode.DATABASE_ERROR);
    this.originalError = originalError;
  }

  /**
   * Creates a DatabaseException from a raw database error.
   */
  static fromError(error: unknown, operation: string): DatabaseException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatabaseException(`Database operation failed: ${operation}`, originalError);
  }
}

// Domain-specific exception factory functions for common scenarios
export const TournamentErrors = {
  notFound: (tournamentId: string) =>
    new NotFoundException(`Tournament ${tournamentId} not found`, ErrorCode.TOURNAMENT_NOT_FOUND),
  emptyParticipants: () =>
    new ValidationException(
      'A tournament needs at least one participant',
      ErrorCode.INVALID_PARTICIPANTS
    ),
  duplicateParticipant: (participant: string) =>
    new ValidationException(
      `Participant ${participant} is listed more than once`,
      ErrorCode.INVALID_PARTICIPANTS
    ),
  invalidParticipantCount: (count: number) =>
    new ValidationException(
      `Participant count must be positive, got ${count}`,
      ErrorCode.INVALID_PARTICIPANTS
    ),
  invalidCompetitorId: (reason: string) =>
    new ValidationException(`Invalid competitor identifier: ${reason}`, ErrorCode.INVALID_PARTICIPANTS),
  unknownParticipant: (participant: string) =>
    new ValidationException(
      `Participant ${participant} is not in this tournament`,
      ErrorCode.UNKNOWN_PARTICIPANT
    ),
  selfMatch: () =>
    new ValidationException('A participant cannot play against itself', ErrorCode.INVALID_PARTICIPANTS),
  invalidOutcome: (outcome: string) =>
    new ValidationException(`Unknown match outcome: ${outcome}`, ErrorCode.INVALID_OUTCOME),
  invalidWinner: (message: string) => new ValidationException(message, ErrorCode.INVALID_WINNER),
  alreadyComplete: () =>
    new ConflictException('Tournament is already complete', ErrorCode.TOURNAMENT_ALREADY_COMPLETE),
  notComplete: () =>
    new ConflictException('Tournament is not complete yet', ErrorCode.TOURNAMENT_NOT_COMPLETE),
  roundNotComplete: (round: number) =>
    new ConflictException(
      `Round ${round} still has unrecorded matches`,
      ErrorCode.ROUND_NOT_COMPLETE
    ),
  matchAlreadyRecorded: (p1: string, p2: string, round: number) =>
    new ConflictException(
      `A result for ${p1} vs ${p2} was already recorded in round ${round}`,
      ErrorCode.MATCH_ALREADY_RECORDED
    ),
  byeAlreadyRecorded: (participant: string, round: number) =>
    new ConflictException(
      `${participant} already received a bye in round ${round}`,
      ErrorCode.MATCH_ALREADY_RECORDED
    ),
  concurrentModification: (tournamentId: string) =>
    new ConflictException(
      `Tournament ${tournamentId} was modified by another request`,
      ErrorCode.CONCURRENT_MODIFICATION
    ),
  notOwner: () => new ForbiddenException('You do not own this tournament'),
};

export const BracketErrors = {
  invalidSize: (expected: string, actual: number) =>
    new ValidationException(
      `Bracket requires ${expected} participants, got ${actual}`,
      ErrorCode.INVALID_BRACKET_SIZE
    ),
  matchNotFound: (matchId: string) =>
    new ValidationException(`Bracket match ${matchId} not found`, ErrorCode.BRACKET_MATCH_NOT_FOUND),
  matchNotReady: (matchId: string) =>
    new ValidationException(
      `Bracket match ${matchId} is still waiting for participants`,
      ErrorCode.BRACKET_MATCH_NOT_READY
    ),
  winnerNotInMatch: (winner: string, matchId: string) =>
    new ValidationException(
      `${winner} is not a participant of bracket match ${matchId}`,
      ErrorCode.INVALID_WINNER
    ),
  matchDecided: (matchId: string) =>
    new ConflictException(
      `Bracket match ${matchId} already has a winner`,
      ErrorCode.BRACKET_MATCH_DECIDED
    ),
  roundNotComplete: (round: number) =>
    new ConflictException(
      `Bracket round ${round} still has undecided matches`,
      ErrorCode.ROUND_NOT_COMPLETE
    ),
  alreadyComplete: () =>
    new ConflictException('Bracket is already complete', ErrorCode.BRACKET_ALREADY_COMPLETE),
  notInitialized: (tournamentId: string) =>
    new ConflictException(
      `Bracket for tournament ${tournamentId} has not been initialized`,
      ErrorCode.BRACKET_NOT_INITIALIZED
    ),
  insufficientQualifiers: (required: number, available: number) =>
    new ConflictException(
      `Bracket needs ${required} qualifiers, only ${available} available`,
      ErrorCode.INSUFFICIENT_QUALIFIERS
    ),
  invalidPlayoff: (message: string) =>
    new ValidationException(`Invalid playoff settings: ${message}`, ErrorCode.INVALID_PLAYOFF),
  corrupt: (tournamentId: string, detail: string) =>
    new DatabaseException(`Stored bracket for tournament ${tournamentId} is corrupt: ${detail}`),
};
