/**
 * Playoff Domain Logic
 *
 * A tournament's playoff is either bracket kind; these functions dispatch on
 * the kind so callers handle one value. No async I/O, no database access.
 */
import { CompetitorId } from './competitor';
import {
  Bracket,
  BracketMatch,
  getBracketChampion,
  getMatchesReadyForVoting,
  isBracketComplete,
  recordMatchResult,
} from './double-elimination';
import {
  SingleEliminationBracket,
  SingleEliminationMatch,
  advanceSingleEliminationRound,
  getCurrentRoundMatches,
  getSingleEliminationChampion,
  isSingleEliminationComplete,
  recordSingleEliminationResult,
} from './single-elimination';

export type Playoff =
  | { kind: 'double-elimination'; bracket: Bracket }
  | { kind: 'single-elimination'; bracket: SingleEliminationBracket };

export type PlayoffMatch = BracketMatch | SingleEliminationMatch;

export function playoffRevision(playoff: Playoff): number {
  return playoff.bracket.revision;
}

/**
 * The one match waiting for a result, or null once the playoff is decided.
 */
export function getNextPlayoffMatch(playoff: Playoff): PlayoffMatch | null {
  if (playoff.kind === 'double-elimination') {
    return getMatchesReadyForVoting(playoff.bracket)[0] ?? null;
  }
  return getCurrentRoundMatches(playoff.bracket).find((m) => m.winner === null) ?? null;
}

/**
 * Decide a match. A single-elimination round moves on by itself once its last
 * match is decided.
 */
export function recordPlayoffResult(
  playoff: Playoff,
  matchId: string,
  winner: CompetitorId
): Playoff {
  if (playoff.kind === 'double-elimination') {
    return { kind: playoff.kind, bracket: recordMatchResult(playoff.bracket, matchId, winner) };
  }

  const recorded = recordSingleEliminationResult(playoff.bracket, matchId, winner);
  const roundDecided = getCurrentRoundMatches(recorded).every((m) => m.winner !== null);
  return {
    kind: playoff.kind,
    bracket: roundDecided ? advanceSingleEliminationRound(recorded) : recorded,
  };
}

export function isPlayoffComplete(playoff: Playoff): boolean {
  return playoff.kind === 'double-elimination'
    ? isBracketComplete(playoff.bracket)
    : isSingleEliminationComplete(playoff.bracket);
}

export function getPlayoffChampion(playoff: Playoff): CompetitorId | null {
  return playoff.kind === 'double-elimination'
    ? getBracketChampion(playoff.bracket)
    : getSingleEliminationChampion(playoff.bracket);
}
