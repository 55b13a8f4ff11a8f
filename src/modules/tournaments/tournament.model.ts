/**
 * Tournament models, database rows and API response mappers
 */
import {
  Bracket,
  MatchResult,
  Pairing,
  Participant,
  ParticipantStanding,
  Playoff,
  PlayoffMatch,
  PlayoffSettings,
  QualificationMatch,
  SingleEliminationBracket,
  Tournament,
  getPlayoffChampion,
  isOutcome,
  isPlayoffComplete,
  isPlayoffKind,
  isTournamentComplete,
  toCompetitorId,
} from '../../domain/tournament';
import { DatabaseException } from '../../utils/exceptions';

export interface TournamentRow {
  id: string;
  user_email: string;
  total_rounds: number;
  current_round: number;
  playoff_kind: string;
  playoff_cutoff: number;
  playoff_reset: boolean;
  version: number;
  created_at: Date;
  updated_at: Date;
}

export interface ParticipantRow {
  tournament_id: string;
  competitor_id: string;
  position: number;
  wins: number;
  losses: number;
  draws: number;
  score: number;
}

export interface MatchRow {
  tournament_id: string;
  round_number: number;
  participant1: string;
  participant2: string | null;
  outcome: string;
  winner: string | null;
}

export interface BracketRow {
  bracket_data: unknown;
}

export function participantFromDatabase(row: ParticipantRow): Participant {
  return {
    id: toCompetitorId(row.competitor_id),
    wins: row.wins,
    losses: row.losses,
    draws: row.draws,
    score: row.score,
  };
}

function playoffFromDatabase(row: TournamentRow): PlayoffSettings {
  const kind = row.playoff_kind;
  if (!isPlayoffKind(kind)) {
    throw new DatabaseException(`Tournament ${row.id} has unknown playoff kind ${kind}`);
  }
  return { kind, cutoff: row.playoff_cutoff, reset: row.playoff_reset };
}

export function tournamentFromDatabase(row: TournamentRow, participants: ParticipantRow[]): Tournament {
  return {
    id: row.id,
    userEmail: row.user_email,
    participants: [...participants]
      .sort((a, b) => a.position - b.position)
      .map(participantFromDatabase),
    currentRound: row.current_round,
    totalRounds: row.total_rounds,
    playoff: playoffFromDatabase(row),
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function resultFromDatabase(row: MatchRow): MatchResult {
  const outcome = row.outcome;
  if (!isOutcome(outcome)) {
    throw new DatabaseException(`Stored match has unknown outcome ${outcome}`);
  }
  if (outcome === 'draw') {
    return { outcome, winner: null };
  }
  if (row.winner === null) {
    throw new DatabaseException(`Stored ${outcome} result has no winner`);
  }
  return { outcome, winner: toCompetitorId(row.winner) };
}

export function matchFromDatabase(row: MatchRow): QualificationMatch {
  return {
    round: row.round_number,
    participant1: toCompetitorId(row.participant1),
    participant2: row.participant2 === null ? null : toCompetitorId(row.participant2),
    result: resultFromDatabase(row),
  };
}

export function tournamentToResponse(tournament: Tournament) {
  return {
    id: tournament.id,
    user_email: tournament.userEmail,
    participants: tournament.participants.map(participantToResponse),
    current_round: tournament.currentRound,
    total_rounds: tournament.totalRounds,
    is_complete: isTournamentComplete(tournament),
    playoff: playoffSettingsToResponse(tournament.playoff),
    version: tournament.version,
    created_at: tournament.createdAt,
    updated_at: tournament.updatedAt,
  };
}

export function playoffSettingsToResponse(settings: PlayoffSettings) {
  return {
    kind: settings.kind,
    cutoff: settings.cutoff,
    reset: settings.reset,
  };
}

export function tournamentSummaryToResponse(tournament: Tournament) {
  return {
    id: tournament.id,
    participant_count: tournament.participants.length,
    current_round: tournament.currentRound,
    total_rounds: tournament.totalRounds,
    is_complete: isTournamentComplete(tournament),
    created_at: tournament.createdAt,
  };
}

export function participantToResponse(participant: Participant) {
  return {
    id: participant.id,
    wins: participant.wins,
    losses: participant.losses,
    draws: participant.draws,
    score: participant.score,
  };
}

export function standingToResponse(standing: ParticipantStanding) {
  return {
    participant: standing.participant,
    score: standing.score,
    wins: standing.wins,
    losses: standing.losses,
    draws: standing.draws,
  };
}

export function pairingToResponse(pairing: Pairing) {
  const [participant1, participant2] = pairing;
  return {
    participant1,
    participant2: participant2 ?? null,
    is_bye: participant2 === undefined,
  };
}

export function matchToResponse(match: QualificationMatch) {
  return {
    round: match.round,
    participant1: match.participant1,
    participant2: match.participant2,
    outcome: match.result.outcome,
    winner: match.result.winner,
    is_bye: match.participant2 === null,
  };
}

export function playoffMatchToResponse(match: PlayoffMatch) {
  return {
    id: match.id,
    ladder: 'ladder' in match ? match.ladder : null,
    round: match.round,
    participant1: match.participant1,
    participant2: match.participant2,
    winner: match.winner,
  };
}

function doubleEliminationToResponse(bracket: Bracket) {
  const roundsToResponse = (rounds: Bracket['winnerRounds']) =>
    rounds.map((ids, index) => ({
      round: index + 1,
      matches: ids.flatMap((id) => {
        const match = bracket.matches.get(id);
        return match ? [playoffMatchToResponse(match)] : [];
      }),
    }));
  const finalToResponse = (id: string | null) => {
    const match = id ? bracket.matches.get(id) : undefined;
    return match ? playoffMatchToResponse(match) : null;
  };

  return {
    winners: roundsToResponse(bracket.winnerRounds),
    losers: roundsToResponse(bracket.loserRounds),
    grand_final: finalToResponse(bracket.grandFinal),
    grand_final_reset: finalToResponse(bracket.grandFinalReset),
    reset: bracket.reset,
  };
}

function singleEliminationToResponse(bracket: SingleEliminationBracket) {
  return {
    rounds: bracket.rounds.map((matches, index) => ({
      round: index + 1,
      matches: matches.map(playoffMatchToResponse),
    })),
    current_round: bracket.currentRound,
  };
}

export function playoffToResponse(playoff: Playoff) {
  const shape =
    playoff.kind === 'double-elimination'
      ? doubleEliminationToResponse(playoff.bracket)
      : singleEliminationToResponse(playoff.bracket);

  return {
    kind: playoff.kind,
    ...shape,
    is_complete: isPlayoffComplete(playoff),
    champion: getPlayoffChampion(playoff),
    revision: playoff.bracket.revision,
  };
}
