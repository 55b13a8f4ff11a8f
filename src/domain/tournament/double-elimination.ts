/**
 * Double-Elimination Bracket Domain Logic
 *
 * Fixed 16-seed bracket: a winner ladder (rounds 1-4), a loser ladder
 * (rounds 1-5) and a grand final between the two ladder champions. With reset
 * enabled, a loser-ladder champion who wins the grand final forces a second,
 * deciding final.
 *
 * Matches live in a map keyed by a stable id derived from ladder, round and
 * sequence (w2_3, l4_1, gf_1); each ladder keeps per-round lists of ids.
 * Every operation returns a new bracket. No async I/O, no database access.
 */
import { CompetitorId } from './competitor';
import { BracketErrors } from '../../utils/exceptions';

export const DOUBLE_ELIMINATION_SIZE = 16;
export const WINNER_LADDER_ROUNDS = 4;
export const LOSER_LADDER_ROUNDS = 5;
export const GRAND_FINAL_ID = 'gf_1';
export const GRAND_FINAL_RESET_ID = 'gf_2';

export type Ladder = 'winners' | 'losers' | 'grand_final';

export interface BracketMatch {
  id: string;
  ladder: Ladder;
  round: number;
  participant1: CompetitorId | null;
  participant2: CompetitorId | null;
  winner: CompetitorId | null;
}

export interface Bracket {
  matches: ReadonlyMap<string, BracketMatch>;
  /** winnerRounds[0] holds the ids of winner-ladder round 1 */
  winnerRounds: ReadonlyArray<readonly string[]>;
  loserRounds: ReadonlyArray<readonly string[]>;
  grandFinal: string | null;
  /** Replayed grand final, opened only when reset is on and the loser-ladder champion wins gf_1 */
  grandFinalReset: string | null;
  reset: boolean;
  /** Number of results recorded so far */
  revision: number;
}

export interface BracketOptions {
  reset?: boolean;
}

const LADDER_PREFIX: Record<Exclude<Ladder, 'grand_final'>, string> = {
  winners: 'w',
  losers: 'l',
};

export function bracketMatchId(ladder: Exclude<Ladder, 'grand_final'>, round: number, sequence: number): string {
  return `${LADDER_PREFIX[ladder]}${round}_${sequence}`;
}

export function isMatchReady(match: BracketMatch): boolean {
  return match.participant1 !== null && match.participant2 !== null && match.winner === null;
}

/**
 * Build the bracket from 16 competitors ordered best to worst.
 * Winner round 1 pairs seed i with seed 15 - i (1 vs 16, 2 vs 15, ...).
 *
 * @throws ValidationException unless exactly 16 distinct competitors are given
 */
export function createBracket(seeds: readonly CompetitorId[], options: BracketOptions = {}): Bracket {
  if (seeds.length !== DOUBLE_ELIMINATION_SIZE) {
    throw BracketErrors.invalidSize(`exactly ${DOUBLE_ELIMINATION_SIZE}`, seeds.length);
  }
  if (new Set(seeds).size !== seeds.length) {
    throw BracketErrors.invalidSize(`${DOUBLE_ELIMINATION_SIZE} distinct`, new Set(seeds).size);
  }

  const matches = new Map<string, BracketMatch>();
  const firstRound: string[] = [];
  const half = DOUBLE_ELIMINATION_SIZE / 2;

  for (let i = 0; i < half; i++) {
    const id = bracketMatchId('winners', 1, i + 1);
    matches.set(id, {
      id,
      ladder: 'winners',
      round: 1,
      participant1: seeds[i],
      participant2: seeds[DOUBLE_ELIMINATION_SIZE - 1 - i],
      winner: null,
    });
    firstRound.push(id);
  }

  return {
    matches,
    winnerRounds: [firstRound, ...emptyRounds(WINNER_LADDER_ROUNDS - 1)],
    loserRounds: emptyRounds(LOSER_LADDER_ROUNDS),
    grandFinal: null,
    grandFinalReset: null,
    reset: options.reset ?? false,
    revision: 0,
  };
}

function emptyRounds(count: number): string[][] {
  return Array.from({ length: count }, () => []);
}

/**
 * All matches in play order: winner rounds, loser rounds, grand final, reset.
 */
export function listBracketMatches(bracket: Bracket): BracketMatch[] {
  const ids = [
    ...bracket.winnerRounds.flat(),
    ...bracket.loserRounds.flat(),
    ...(bracket.grandFinal ? [bracket.grandFinal] : []),
    ...(bracket.grandFinalReset ? [bracket.grandFinalReset] : []),
  ];
  return ids.flatMap((id) => {
    const match = bracket.matches.get(id);
    return match ? [match] : [];
  });
}

/**
 * The next match to decide, or nothing when the bracket is finished.
 * Matches are exposed strictly one at a time: winner rounds 1-4 drain first,
 * then loser rounds 1-5, then the grand final and its reset.
 */
export function getMatchesReadyForVoting(bracket: Bracket): BracketMatch[] {
  if (isBracketComplete(bracket)) {
    return [];
  }
  const next = listBracketMatches(bracket).find(isMatchReady);
  return next ? [next] : [];
}

export function isBracketComplete(bracket: Bracket): boolean {
  return getBracketChampion(bracket) !== null;
}

/**
 * Winner of the last final played: the reset when one was opened, else gf_1.
 */
export function getBracketChampion(bracket: Bracket): CompetitorId | null {
  const decidingFinal = bracket.grandFinalReset ?? bracket.grandFinal;
  if (!decidingFinal) return null;
  return bracket.matches.get(decidingFinal)?.winner ?? null;
}

/**
 * Decide a match and route both competitors onward.
 *
 * Winner ladder rounds 1-3 send the winner to the next winner round and the
 * loser to the loser round with the same number. The winner-ladder final sends
 * its winner to grand final slot 1 and its loser to loser round 4. Loser
 * rounds 1-4 send the winner one round up; the loser-ladder final fills grand
 * final slot 2. Losers in the loser ladder are eliminated. When reset is on and
 * the loser-ladder champion takes gf_1, the same pair meets again in gf_2.
 *
 * @throws ValidationException for an unknown match, an unfilled match or a winner who did not play
 * @throws ConflictException when the match already has a winner
 */
export function recordMatchResult(
  bracket: Bracket,
  matchId: string,
  winner: CompetitorId
): Bracket {
  const match = bracket.matches.get(matchId);
  if (!match) {
    throw BracketErrors.matchNotFound(matchId);
  }
  if (match.winner !== null) {
    throw BracketErrors.matchDecided(matchId);
  }
  if (match.participant1 === null || match.participant2 === null) {
    throw BracketErrors.matchNotReady(matchId);
  }
  if (winner !== match.participant1 && winner !== match.participant2) {
    throw BracketErrors.winnerNotInMatch(winner, matchId);
  }
  const loser = winner === match.participant1 ? match.participant2 : match.participant1;

  let next: Bracket = {
    ...bracket,
    matches: new Map(bracket.matches).set(matchId, { ...match, winner }),
    revision: bracket.revision + 1,
  };

  switch (match.ladder) {
    case 'winners':
      if (match.round < WINNER_LADDER_ROUNDS) {
        next = placeInRound(next, 'winners', match.round + 1, winner);
        next = placeInRound(next, 'losers', match.round, loser);
      } else {
        next = placeInGrandFinal(next, 1, winner);
        next = placeInRound(next, 'losers', WINNER_LADDER_ROUNDS, loser);
      }
      break;
    case 'losers':
      next =
        match.round < LOSER_LADDER_ROUNDS
          ? placeInRound(next, 'losers', match.round + 1, winner)
          : placeInGrandFinal(next, 2, winner);
      break;
    case 'grand_final':
      if (match.id === GRAND_FINAL_ID && bracket.reset && winner === match.participant2) {
        next = openGrandFinalReset(next, match.participant1, match.participant2);
      }
      break;
  }

  return next;
}

/**
 * Put a competitor into the first match of the round with an open slot,
 * opening a new match when every existing one is full.
 */
function placeInRound(
  bracket: Bracket,
  ladder: Exclude<Ladder, 'grand_final'>,
  round: number,
  competitor: CompetitorId
): Bracket {
  const rounds = ladder === 'winners' ? bracket.winnerRounds : bracket.loserRounds;
  const roundIds = rounds[round - 1] ?? [];
  const matches = new Map(bracket.matches);

  const openId = roundIds.find((id) => {
    const candidate = matches.get(id);
    return candidate !== undefined && (candidate.participant1 === null || candidate.participant2 === null);
  });
  const open = openId ? matches.get(openId) : undefined;

  if (open) {
    matches.set(
      open.id,
      open.participant1 === null
        ? { ...open, participant1: competitor }
        : { ...open, participant2: competitor }
    );
    return { ...bracket, matches };
  }

  const id = bracketMatchId(ladder, round, roundIds.length + 1);
  matches.set(id, { id, ladder, round, participant1: competitor, participant2: null, winner: null });
  const updatedRounds = rounds.map((ids, index) => (index === round - 1 ? [...ids, id] : ids));

  return ladder === 'winners'
    ? { ...bracket, matches, winnerRounds: updatedRounds }
    : { ...bracket, matches, loserRounds: updatedRounds };
}

function placeInGrandFinal(bracket: Bracket, slot: 1 | 2, competitor: CompetitorId): Bracket {
  const matches = new Map(bracket.matches);
  const existing = bracket.grandFinal ? matches.get(bracket.grandFinal) : undefined;
  const final: BracketMatch = existing ?? {
    id: GRAND_FINAL_ID,
    ladder: 'grand_final',
    round: 1,
    participant1: null,
    participant2: null,
    winner: null,
  };

  matches.set(
    final.id,
    slot === 1 ? { ...final, participant1: competitor } : { ...final, participant2: competitor }
  );
  return { ...bracket, matches, grandFinal: final.id };
}

function openGrandFinalReset(
  bracket: Bracket,
  winnerLadderChampion: CompetitorId,
  loserLadderChampion: CompetitorId
): Bracket {
  const reset: BracketMatch = {
    id: GRAND_FINAL_RESET_ID,
    ladder: 'grand_final',
    round: 2,
    participant1: winnerLadderChampion,
    participant2: loserLadderChampion,
    winner: null,
  };
  return {
    ...bracket,
    matches: new Map(bracket.matches).set(reset.id, reset),
    grandFinalReset: reset.id,
  };
}
