/**
 * Single-Elimination Bracket Domain Logic
 *
 * Round-by-round knockout over a power-of-two seeded field.
 * No async I/O, no database access.
 */
import { CompetitorId } from './competitor';
import { BracketErrors } from '../../utils/exceptions';

export interface SingleEliminationMatch {
  id: string;
  round: number;
  participant1: CompetitorId;
  participant2: CompetitorId;
  winner: CompetitorId | null;
}

export interface SingleEliminationBracket {
  /** rounds[0] is round 1; later rounds appear as the bracket advances */
  rounds: ReadonlyArray<readonly SingleEliminationMatch[]>;
  /** 1-based; points past the last round once the final has been played out */
  currentRound: number;
  /** Number of results recorded so far */
  revision: number;
}

function isPowerOfTwo(n: number): boolean {
  return n >= 2 && (n & (n - 1)) === 0;
}

function createMatch(
  round: number,
  sequence: number,
  participant1: CompetitorId,
  participant2: CompetitorId
): SingleEliminationMatch {
  return { id: `r${round}_${sequence}`, round, participant1, participant2, winner: null };
}

/**
 * Seed round 1: 1 vs N, 2 vs N-1, ... An 8-field is laid out 1v8, 4v5, 3v6, 2v7
 * so the top two seeds can only meet in the final.
 *
 * @throws ValidationException unless the field is a power of two of distinct competitors
 */
export function createSingleEliminationBracket(
  seeds: readonly CompetitorId[]
): SingleEliminationBracket {
  if (!isPowerOfTwo(seeds.length)) {
    throw BracketErrors.invalidSize('a power of two (at least 2)', seeds.length);
  }
  if (new Set(seeds).size !== seeds.length) {
    throw BracketErrors.invalidSize('distinct', new Set(seeds).size);
  }

  const pairs: Array<[CompetitorId, CompetitorId]> = [];
  for (let left = 0, right = seeds.length - 1; left < right; left++, right--) {
    pairs.push([seeds[left], seeds[right]]);
  }
  const ordered = seeds.length === 8 ? [pairs[0], pairs[3], pairs[2], pairs[1]] : pairs;

  return {
    rounds: [ordered.map(([a, b], index) => createMatch(1, index + 1, a, b))],
    currentRound: 1,
    revision: 0,
  };
}

export function getCurrentRoundMatches(bracket: SingleEliminationBracket): SingleEliminationMatch[] {
  return [...(bracket.rounds[bracket.currentRound - 1] ?? [])];
}

/**
 * @throws ValidationException when the match is not in the current round or the winner did not play
 * @throws ConflictException when the match is already decided
 */
export function recordSingleEliminationResult(
  bracket: SingleEliminationBracket,
  matchId: string,
  winner: CompetitorId
): SingleEliminationBracket {
  const roundIndex = bracket.currentRound - 1;
  const round = bracket.rounds[roundIndex] ?? [];
  const match = round.find((m) => m.id === matchId);

  if (!match) {
    throw BracketErrors.matchNotFound(matchId);
  }
  if (match.winner !== null) {
    throw BracketErrors.matchDecided(matchId);
  }
  if (winner !== match.participant1 && winner !== match.participant2) {
    throw BracketErrors.winnerNotInMatch(winner, matchId);
  }

  const updatedRound = round.map((m) => (m.id === matchId ? { ...m, winner } : m));
  return {
    ...bracket,
    rounds: bracket.rounds.map((r, index) => (index === roundIndex ? updatedRound : r)),
    revision: bracket.revision + 1,
  };
}

/**
 * Pair adjacent winners of the current round into the next one. Advancing past
 * the final completes the bracket.
 *
 * @throws ConflictException when the bracket is complete or the round has undecided matches
 */
export function advanceSingleEliminationRound(
  bracket: SingleEliminationBracket
): SingleEliminationBracket {
  if (isSingleEliminationComplete(bracket)) {
    throw BracketErrors.alreadyComplete();
  }

  const current = getCurrentRoundMatches(bracket);
  const winners: CompetitorId[] = [];
  for (const match of current) {
    if (match.winner === null) {
      throw BracketErrors.roundNotComplete(bracket.currentRound);
    }
    winners.push(match.winner);
  }

  if (winners.length === 1) {
    return { ...bracket, currentRound: bracket.currentRound + 1 };
  }

  const nextRound = bracket.currentRound + 1;
  const matches: SingleEliminationMatch[] = [];
  for (let i = 0; i < winners.length; i += 2) {
    matches.push(createMatch(nextRound, i / 2 + 1, winners[i], winners[i + 1]));
  }
  return { ...bracket, rounds: [...bracket.rounds, matches], currentRound: nextRound };
}

export function isSingleEliminationComplete(bracket: SingleEliminationBracket): boolean {
  return bracket.currentRound > bracket.rounds.length;
}

/**
 * Winner of the final once it has been decided.
 */
export function getSingleEliminationChampion(
  bracket: SingleEliminationBracket
): CompetitorId | null {
  const lastRound = bracket.rounds[bracket.rounds.length - 1];
  if (!lastRound || lastRound.length !== 1) {
    return null;
  }
  return lastRound[0].winner;
}
