/**
 * Tournament Entities
 *
 * Data model for the qualification phase plus invariant-preserving mutators.
 * Every mutator returns a new value; nothing here touches storage.
 */
import { CompetitorId } from './competitor';
import { TournamentErrors } from '../../utils/exceptions';

export const MATCH_OUTCOMES = ['win', 'loss', 'draw'] as const;
export type MatchOutcome = (typeof MATCH_OUTCOMES)[number];

export const PLAYOFF_KINDS = ['single-elimination', 'double-elimination'] as const;
export type PlayoffKind = (typeof PLAYOFF_KINDS)[number];

/**
 * How qualification hands over to the playoff.
 */
export interface PlayoffSettings {
  kind: PlayoffKind;
  /** Number of qualifiers seeded into the playoff */
  cutoff: number;
  /** Double elimination only: replay the grand final when the loser-ladder champion wins it */
  reset: boolean;
}

/**
 * A decided match. A draw never has a winner; a win or loss always does.
 */
export type MatchResult =
  | { outcome: 'draw'; winner: null }
  | { outcome: 'win' | 'loss'; winner: CompetitorId };

export interface Participant {
  id: CompetitorId;
  wins: number;
  losses: number;
  draws: number;
  /** Always 3 * wins + draws */
  score: number;
}

export interface QualificationMatch {
  round: number;
  participant1: CompetitorId;
  /** null for a bye */
  participant2: CompetitorId | null;
  result: MatchResult;
}

export interface Tournament {
  id: string;
  userEmail: string;
  participants: Participant[];
  currentRound: number;
  totalRounds: number;
  playoff: PlayoffSettings;
  /** Incremented on every save, used for compare-and-swap writes */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ParticipantStanding {
  participant: CompetitorId;
  score: number;
  wins: number;
  losses: number;
  draws: number;
}

/** One or two members; a single member is a bye. */
export type Pairing = [CompetitorId] | [CompetitorId, CompetitorId];

export function isOutcome(value: string): value is MatchOutcome {
  return MATCH_OUTCOMES.some((outcome) => outcome === value);
}

export function isPlayoffKind(value: string): value is PlayoffKind {
  return PLAYOFF_KINDS.some((kind) => kind === value);
}

export function createParticipant(id: CompetitorId): Participant {
  return { id, wins: 0, losses: 0, draws: 0, score: 0 };
}

export function recordWin(participant: Participant): Participant {
  return { ...participant, wins: participant.wins + 1, score: participant.score + 3 };
}

export function recordLoss(participant: Participant): Participant {
  return { ...participant, losses: participant.losses + 1 };
}

export function recordDraw(participant: Participant): Participant {
  return { ...participant, draws: participant.draws + 1, score: participant.score + 1 };
}

export function isTournamentComplete(tournament: Tournament): boolean {
  return tournament.currentRound >= tournament.totalRounds;
}

export function advanceRound(tournament: Tournament): Tournament {
  return { ...tournament, currentRound: tournament.currentRound + 1 };
}

export function findParticipant(
  tournament: Tournament,
  id: CompetitorId
): Participant | undefined {
  return tournament.participants.find((p) => p.id === id);
}

export function hasParticipant(tournament: Tournament, id: CompetitorId): boolean {
  return findParticipant(tournament, id) !== undefined;
}

/**
 * Replace participants by id, keeping list order.
 */
export function withParticipants(tournament: Tournament, updated: Participant[]): Tournament {
  const byId = new Map(updated.map((p) => [p.id, p]));
  return {
    ...tournament,
    participants: tournament.participants.map((p) => byId.get(p.id) ?? p),
  };
}

/**
 * Build a result from loosely-typed input.
 * @throws ValidationException for an unknown outcome or a winner that does not fit it
 */
export function resolveMatchResult(
  outcome: string,
  winner: CompetitorId | null,
  participant1: CompetitorId,
  participant2: CompetitorId
): MatchResult {
  if (!isOutcome(outcome)) {
    throw TournamentErrors.invalidOutcome(outcome);
  }

  if (outcome === 'draw') {
    if (winner !== null) {
      throw TournamentErrors.invalidWinner('A draw cannot have a winner');
    }
    return { outcome, winner: null };
  }

  if (winner === null) {
    throw TournamentErrors.invalidWinner(`A ${outcome} result requires a winner`);
  }
  if (winner !== participant1 && winner !== participant2) {
    throw TournamentErrors.invalidWinner(`Winner ${winner} did not play in this match`);
  }
  return { outcome, winner };
}

/**
 * Apply a decided result to both participants.
 */
export function applyResult(
  participant1: Participant,
  participant2: Participant,
  result: MatchResult
): [Participant, Participant] {
  if (result.outcome === 'draw') {
    return [recordDraw(participant1), recordDraw(participant2)];
  }
  return result.winner === participant1.id
    ? [recordWin(participant1), recordLoss(participant2)]
    : [recordLoss(participant1), recordWin(participant2)];
}

/**
 * Score change a stored match gave each side, keyed by competitor.
 */
export function scoreDeltas(match: QualificationMatch): Map<CompetitorId, number> {
  const deltas = new Map<CompetitorId, number>();
  if (match.participant2 === null) {
    deltas.set(match.participant1, 3);
    return deltas;
  }
  if (match.result.outcome === 'draw') {
    deltas.set(match.participant1, 1);
    deltas.set(match.participant2, 1);
    return deltas;
  }
  const loser =
    match.result.winner === match.participant1 ? match.participant2 : match.participant1;
  deltas.set(match.result.winner, 3);
  deltas.set(loser, 0);
  return deltas;
}

export function toStanding(participant: Participant): ParticipantStanding {
  return {
    participant: participant.id,
    score: participant.score,
    wins: participant.wins,
    losses: participant.losses,
    draws: participant.draws,
  };
}
