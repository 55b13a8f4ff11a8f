/**
 * Swiss Pairing Domain Logic
 *
 * Pure functions for qualification pairings, round counts, tie-break ordering
 * and per-outcome scoring. No async I/O, no database access.
 */
import { CompetitorId, compareCompetitorIds, pairKey } from './competitor';
import { MatchOutcome, Pairing, isOutcome } from './entities';
import { TournamentErrors } from '../../utils/exceptions';

export const MIN_ROUNDS = 3;
export const MAX_ROUNDS = 8;

export const POINTS_FOR_WIN = 3;
export const POINTS_FOR_DRAW = 1;
export const POINTS_FOR_LOSS = 0;

export type Standings = ReadonlyMap<CompetitorId, number>;

export interface ScoredCompetitor {
  participant: CompetitorId;
  score: number;
}

/**
 * A raw result as consumed by calculateStandings, scored from participant1's
 * side: a win credits participant1, a loss credits nobody.
 */
export interface RawResult {
  participant1: CompetitorId;
  participant2: CompetitorId;
  outcome: MatchOutcome;
}

/**
 * Order by score DESC, then identifier ASC.
 */
function byStanding(a: ScoredCompetitor, b: ScoredCompetitor): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareCompetitorIds(a.participant, b.participant);
}

/**
 * Produce the next round's pairings.
 *
 * Participants are taken in priority order (standings order when standings are
 * given, input order otherwise). Each unpaired participant is matched with the
 * later unpaired candidate closest in score that it has not met before; score
 * ties go to the first candidate scanned.
 *
 * A participant with no fresh candidate takes the round's single bye if the
 * field is odd and the bye is still free. Otherwise it is paired with the
 * closest-score rematch, so nobody is left out and a round never has more than
 * one bye.
 *
 * @throws ValidationException when participants is empty
 */
export function generatePairings(
  participants: readonly CompetitorId[],
  previousMatchups: ReadonlyArray<readonly [CompetitorId, CompetitorId]>,
  standings?: Standings
): Pairing[] {
  if (participants.length === 0) {
    throw TournamentErrors.emptyParticipants();
  }
  if (participants.length === 1) {
    return [[participants[0]]];
  }

  const scoreOf = (id: CompetitorId): number => standings?.get(id) ?? 0;
  const order = standings
    ? participants
        .map((participant) => ({ participant, score: scoreOf(participant) }))
        .sort(byStanding)
        .map((entry) => entry.participant)
    : [...participants];

  const played = new Set(previousMatchups.map(([a, b]) => pairKey(a, b)));
  const paired = new Set<CompetitorId>();
  const pairings: Pairing[] = [];
  let byeAvailable = order.length % 2 === 1;

  for (let i = 0; i < order.length; i++) {
    const current = order[i];
    if (paired.has(current)) continue;

    const candidates = order.slice(i + 1).filter((c) => !paired.has(c));
    const fresh = candidates.filter((c) => !played.has(pairKey(current, c)));

    const opponent =
      closestByScore(current, fresh, scoreOf) ??
      (byeAvailable ? null : closestByScore(current, candidates, scoreOf));

    paired.add(current);
    if (opponent === null) {
      byeAvailable = false;
      pairings.push([current]);
      continue;
    }

    paired.add(opponent);
    pairings.push([current, opponent]);
  }

  return pairings;
}

function closestByScore(
  current: CompetitorId,
  candidates: readonly CompetitorId[],
  scoreOf: (id: CompetitorId) => number
): CompetitorId | null {
  let best: CompetitorId | null = null;
  let bestDiff = Infinity;
  const currentScore = scoreOf(current);

  for (const candidate of candidates) {
    const diff = Math.abs(currentScore - scoreOf(candidate));
    if (diff < bestDiff) {
      best = candidate;
      bestDiff = diff;
    }
  }
  return best;
}

/**
 * Number of qualification rounds for a field of n.
 * One participant needs no rounds; otherwise ceil(log2 n) clamped to [3, 8].
 *
 * @throws ValidationException when n is not positive
 */
export function calculateTotalRounds(participantCount: number): number {
  if (participantCount <= 0) {
    throw TournamentErrors.invalidParticipantCount(participantCount);
  }
  if (participantCount === 1) {
    return 0;
  }
  const rounds = Math.ceil(Math.log2(participantCount));
  return Math.max(MIN_ROUNDS, Math.min(MAX_ROUNDS, rounds));
}

/**
 * Standings entries that belong to participants, ordered by score DESC then identifier ASC.
 */
export function sortStandingsByTieBreaker(
  standings: Standings,
  participants: readonly CompetitorId[]
): ScoredCompetitor[] {
  const members = new Set(participants);
  const entries: ScoredCompetitor[] = [];
  for (const [participant, score] of standings) {
    if (members.has(participant)) {
      entries.push({ participant, score });
    }
  }
  return entries.sort(byStanding);
}

export function getScoreForResult(outcome: string): number {
  if (!isOutcome(outcome)) {
    throw TournamentErrors.invalidOutcome(outcome);
  }
  switch (outcome) {
    case 'win':
      return POINTS_FOR_WIN;
    case 'draw':
      return POINTS_FOR_DRAW;
    case 'loss':
      return POINTS_FOR_LOSS;
  }
}

/**
 * Rebuild a standings map from raw results. Every participant starts at 0.
 */
export function calculateStandings(
  participants: readonly CompetitorId[],
  results: readonly RawResult[]
): Map<CompetitorId, number> {
  const standings = new Map<CompetitorId, number>(participants.map((p) => [p, 0]));
  const credit = (id: CompetitorId, points: number) =>
    standings.set(id, (standings.get(id) ?? 0) + points);

  for (const result of results) {
    switch (result.outcome) {
      case 'win':
        credit(result.participant1, POINTS_FOR_WIN);
        break;
      case 'loss':
        credit(result.participant1, POINTS_FOR_LOSS);
        break;
      case 'draw':
        credit(result.participant1, POINTS_FOR_DRAW);
        credit(result.participant2, POINTS_FOR_DRAW);
        break;
    }
  }
  return standings;
}
