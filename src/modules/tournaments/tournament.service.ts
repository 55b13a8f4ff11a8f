import { v4 as uuidv4 } from 'uuid';
import { ITournamentRepository } from './tournament.repository';
import {
  CompetitorId,
  DEFAULT_PLAYOFF,
  Pairing,
  ParticipantStanding,
  Playoff,
  PlayoffMatch,
  PlayoffSettings,
  QualificationMatch,
  Tournament,
  advanceRound,
  applyResult,
  buildPlayoffBracket,
  calculateTotalRounds,
  createParticipant,
  findParticipant,
  generatePairings,
  getNextPlayoffMatch,
  getPlayoffChampion,
  isPlayoffComplete,
  isTournamentComplete,
  pairKey,
  recordPlayoffResult,
  recordWin,
  resolveMatchResult,
  scoreDeltas,
  standingsFromParticipants,
  toCompetitorId,
  toStanding,
  validatePlayoffSettings,
  withParticipants,
} from '../../domain/tournament';
import { BracketErrors, TournamentErrors } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';
import { TournamentMetric, metrics } from '../../services/metrics.service';

/**
 * Drives a tournament from Swiss qualification into its playoff. Every
 * operation reads the stored state, computes, and writes it back; nothing is
 * cached between calls.
 */
export class TournamentService {
  constructor(private readonly tournamentRepo: ITournamentRepository) {}

  /**
   * Create a tournament at round 0 owned by the given user.
   *
   * @throws ValidationException for an empty or repeated field, or unusable playoff settings
   */
  async createTournament(
    participants: readonly string[],
    userEmail: string,
    playoff: PlayoffSettings = DEFAULT_PLAYOFF
  ): Promise<Tournament> {
    if (participants.length === 0) {
      throw TournamentErrors.emptyParticipants();
    }
    validatePlayoffSettings(playoff);

    const ids = participants.map(toCompetitorId);
    const seen = new Set<CompetitorId>();
    for (const id of ids) {
      if (seen.has(id)) throw TournamentErrors.duplicateParticipant(id);
      seen.add(id);
    }

    const now = new Date();
    const tournament = await this.tournamentRepo.save({
      id: uuidv4(),
      userEmail,
      participants: ids.map(createParticipant),
      currentRound: 0,
      totalRounds: calculateTotalRounds(ids.length),
      playoff,
      version: 0,
      createdAt: now,
      updatedAt: now,
    });

    metrics.increment(TournamentMetric.CREATED, { playoff: playoff.kind });
    logger.info('Tournament created', {
      tournamentId: tournament.id,
      participants: ids.length,
      totalRounds: tournament.totalRounds,
      playoff: playoff.kind,
    });
    return tournament;
  }

  async getTournament(tournamentId: string): Promise<Tournament> {
    const tournament = await this.tournamentRepo.findById(tournamentId);
    if (!tournament) {
      throw TournamentErrors.notFound(tournamentId);
    }
    return tournament;
  }

  /**
   * Load a tournament and check that the caller owns it.
   * @throws ForbiddenException for any other user
   */
  async getOwnedTournament(tournamentId: string, userEmail: string): Promise<Tournament> {
    const tournament = await this.getTournament(tournamentId);
    if (tournament.userEmail !== userEmail) {
      throw TournamentErrors.notOwner();
    }
    return tournament;
  }

  async getUserTournaments(userEmail: string): Promise<Tournament[]> {
    return this.tournamentRepo.findByUserEmail(userEmail);
  }

  async getQualificationMatches(tournamentId: string): Promise<QualificationMatch[]> {
    await this.getTournament(tournamentId);
    return this.tournamentRepo.loadMatches(tournamentId);
  }

  /**
   * Pairings for the current round, or [] once qualification is over.
   */
  async getCurrentRoundPairings(tournamentId: string): Promise<Pairing[]> {
    const tournament = await this.getTournament(tournamentId);
    if (isTournamentComplete(tournament)) {
      return [];
    }
    const matches = await this.tournamentRepo.loadMatches(tournamentId);
    return this.pairingsFor(tournament, matches);
  }

  /**
   * Pair on the standings as they stood when the round began and on every
   * two-sided match from earlier rounds, so the round's pairings stay the same
   * while its results come in.
   */
  private pairingsFor(tournament: Tournament, matches: QualificationMatch[]): Pairing[] {
    const previousMatchups: Array<[CompetitorId, CompetitorId]> = [];
    const standings = standingsFromParticipants(tournament.participants);

    for (const match of matches) {
      if (match.round < tournament.currentRound && match.participant2 !== null) {
        previousMatchups.push([match.participant1, match.participant2]);
      }
      if (match.round === tournament.currentRound) {
        for (const [id, delta] of scoreDeltas(match)) {
          standings.set(id, (standings.get(id) ?? 0) - delta);
        }
      }
    }

    return generatePairings(
      tournament.participants.map((p) => p.id),
      previousMatchups,
      standings
    );
  }

  /**
   * Record a qualification result for the current round.
   *
   * @throws ValidationException for unknown participants, outcomes or winners
   * @throws ConflictException when qualification is over or the pairing already has a result this round
   */
  async recordMatchResult(
    tournamentId: string,
    participant1: string,
    participant2: string,
    outcome: string,
    winner: string | null
  ): Promise<Tournament> {
    const tournament = await this.getTournament(tournamentId);
    const p1 = toCompetitorId(participant1);
    const p2 = toCompetitorId(participant2);

    if (p1 === p2) {
      throw TournamentErrors.selfMatch();
    }
    const first = findParticipant(tournament, p1);
    if (!first) throw TournamentErrors.unknownParticipant(p1);
    const second = findParticipant(tournament, p2);
    if (!second) throw TournamentErrors.unknownParticipant(p2);

    const result = resolveMatchResult(outcome, winner === null ? null : toCompetitorId(winner), p1, p2);

    if (isTournamentComplete(tournament)) {
      throw TournamentErrors.alreadyComplete();
    }
    const matches = await this.tournamentRepo.loadMatches(tournamentId);
    const key = pairKey(p1, p2);
    const duplicate = matches.some(
      (m) =>
        m.round === tournament.currentRound &&
        m.participant2 !== null &&
        pairKey(m.participant1, m.participant2) === key
    );
    if (duplicate) {
      throw TournamentErrors.matchAlreadyRecorded(p1, p2, tournament.currentRound);
    }

    const saved = await this.tournamentRepo.recordResult(
      withParticipants(tournament, applyResult(first, second, result)),
      { round: tournament.currentRound, participant1: p1, participant2: p2, result }
    );

    metrics.increment(TournamentMetric.RESULTS_RECORDED, { outcome: result.outcome });
    logger.debug('Match result recorded', {
      tournamentId,
      round: tournament.currentRound,
      participant1: p1,
      participant2: p2,
      outcome: result.outcome,
    });
    return saved;
  }

  /**
   * Credit a participant with a win for the current round without an opponent.
   */
  async recordBye(tournamentId: string, participant: string): Promise<Tournament> {
    const tournament = await this.getTournament(tournamentId);
    const id = toCompetitorId(participant);

    const current = findParticipant(tournament, id);
    if (!current) throw TournamentErrors.unknownParticipant(id);
    if (isTournamentComplete(tournament)) {
      throw TournamentErrors.alreadyComplete();
    }

    const matches = await this.tournamentRepo.loadMatches(tournamentId);
    const alreadyHasBye = matches.some(
      (m) => m.round === tournament.currentRound && m.participant2 === null && m.participant1 === id
    );
    if (alreadyHasBye) {
      throw TournamentErrors.byeAlreadyRecorded(id, tournament.currentRound);
    }

    const saved = await this.tournamentRepo.recordResult(
      withParticipants(tournament, [recordWin(current)]),
      {
        round: tournament.currentRound,
        participant1: id,
        participant2: null,
        result: { outcome: 'win', winner: id },
      }
    );

    metrics.increment(TournamentMetric.BYES_RECORDED);
    logger.debug('Bye recorded', { tournamentId, round: tournament.currentRound, participant: id });
    return saved;
  }

  /**
   * True once every two-sided pairing of the current round has a stored result.
   * Byes need nothing; a completed tournament is always complete.
   */
  async isCurrentRoundComplete(tournamentId: string): Promise<boolean> {
    const tournament = await this.getTournament(tournamentId);
    return this.roundComplete(tournament);
  }

  private async roundComplete(tournament: Tournament): Promise<boolean> {
    if (isTournamentComplete(tournament)) {
      return true;
    }

    const matches = await this.tournamentRepo.loadMatches(tournament.id);
    const recorded = new Set<string>();
    for (const match of matches) {
      if (match.round === tournament.currentRound && match.participant2 !== null) {
        recorded.add(pairKey(match.participant1, match.participant2));
      }
    }

    return this.pairingsFor(tournament, matches).every(
      (pairing) => pairing.length === 1 || recorded.has(pairKey(pairing[0], pairing[1]))
    );
  }

  /**
   * Move to the next round. Finishing qualification with at least the playoff
   * cutoff in the field seeds the playoff.
   *
   * @throws ConflictException when qualification is over or the round still has open pairings
   */
  async advanceToNextRound(tournamentId: string): Promise<Tournament> {
    const tournament = await this.getTournament(tournamentId);
    if (isTournamentComplete(tournament)) {
      throw TournamentErrors.alreadyComplete();
    }
    if (!(await this.roundComplete(tournament))) {
      throw TournamentErrors.roundNotComplete(tournament.currentRound);
    }

    const saved = await this.tournamentRepo.save(advanceRound(tournament));
    metrics.increment(TournamentMetric.ROUNDS_ADVANCED);
    logger.info('Tournament round advanced', {
      tournamentId,
      currentRound: saved.currentRound,
      totalRounds: saved.totalRounds,
    });

    if (isTournamentComplete(saved)) {
      const { cutoff } = saved.playoff;
      if (saved.participants.length >= cutoff) {
        await this.initializeBracket(tournamentId);
      } else {
        metrics.increment(TournamentMetric.PLAYOFFS_SKIPPED);
        logger.warn('Qualification finished without a playoff', {
          tournamentId,
          participants: saved.participants.length,
          required: cutoff,
        });
      }
    }
    return saved;
  }

  /**
   * Seed the top qualifiers into the tournament's playoff. Returns the existing
   * playoff when one is already stored.
   *
   * @throws ConflictException before qualification ends or with fewer participants than the cutoff
   */
  async initializeBracket(tournamentId: string): Promise<Playoff> {
    const tournament = await this.getTournament(tournamentId);
    const existing = await this.tournamentRepo.loadBracketData(tournamentId);
    if (existing) {
      return existing;
    }

    if (!isTournamentComplete(tournament)) {
      throw TournamentErrors.notComplete();
    }
    const { cutoff } = tournament.playoff;
    if (tournament.participants.length < cutoff) {
      throw BracketErrors.insufficientQualifiers(cutoff, tournament.participants.length);
    }

    const { playoff, seeds } = buildPlayoffBracket(
      tournament.participants,
      standingsFromParticipants(tournament.participants),
      tournament.playoff
    );
    await this.tournamentRepo.saveBracketData(tournamentId, playoff);

    metrics.increment(TournamentMetric.PLAYOFFS_STARTED, { kind: playoff.kind });
    logger.info('Playoff bracket initialized', {
      tournamentId,
      kind: playoff.kind,
      topSeed: seeds[0]?.id,
    });
    return playoff;
  }

  async getBracket(tournamentId: string): Promise<Playoff | null> {
    await this.getTournament(tournamentId);
    return this.tournamentRepo.loadBracketData(tournamentId);
  }

  /**
   * @throws ConflictException when no bracket exists yet or the match is already decided
   * @throws ValidationException for an unknown match or a winner who did not play
   */
  async recordBracketMatchResult(
    tournamentId: string,
    matchId: string,
    winner: string
  ): Promise<Playoff> {
    const playoff = await this.getBracket(tournamentId);
    if (!playoff) {
      throw BracketErrors.notInitialized(tournamentId);
    }
    const updated = recordPlayoffResult(playoff, matchId, toCompetitorId(winner));
    await this.tournamentRepo.saveBracketData(tournamentId, updated);
    metrics.increment(TournamentMetric.PLAYOFF_RESULTS_RECORDED, { kind: updated.kind });

    // A decided playoff rejects further results, so a champion here is a new one
    const champion = getPlayoffChampion(updated);
    if (champion) {
      metrics.increment(TournamentMetric.CHAMPIONS_DECIDED, { kind: updated.kind });
      logger.info('Playoff champion decided', { tournamentId, champion });
    }
    return updated;
  }

  /**
   * The single match waiting for a result, or null when there is none,
   * including before the playoff exists.
   */
  async getNextBracketMatch(tournamentId: string): Promise<PlayoffMatch | null> {
    const playoff = await this.getBracket(tournamentId);
    return playoff ? getNextPlayoffMatch(playoff) : null;
  }

  async isBracketComplete(tournamentId: string): Promise<boolean> {
    const playoff = await this.getBracket(tournamentId);
    return playoff !== null && isPlayoffComplete(playoff);
  }

  /**
   * Standings in participant-list order.
   */
  async getCurrentStandings(tournamentId: string): Promise<ParticipantStanding[]> {
    const tournament = await this.getTournament(tournamentId);
    return tournament.participants.map(toStanding);
  }

  /**
   * @throws ConflictException while qualification is still running
   */
  async getFinalStandings(tournamentId: string): Promise<ParticipantStanding[]> {
    const tournament = await this.getTournament(tournamentId);
    if (!isTournamentComplete(tournament)) {
      throw TournamentErrors.notComplete();
    }
    return tournament.participants.map(toStanding);
  }

  async deleteTournament(tournamentId: string): Promise<void> {
    if (!(await this.tournamentRepo.exists(tournamentId))) {
      throw TournamentErrors.notFound(tournamentId);
    }
    await this.tournamentRepo.delete(tournamentId);
    logger.info('Tournament deleted', { tournamentId });
  }
}
