import { Pool, PoolClient } from 'pg';
import {
  CompetitorId,
  Playoff,
  QualificationMatch,
  Tournament,
  deserializePlayoff,
  pairKey,
  playoffRevision,
  serializePlayoff,
} from '../../domain/tournament';
import {
  BracketRow,
  MatchRow,
  ParticipantRow,
  TournamentRow,
  matchFromDatabase,
  tournamentFromDatabase,
} from './tournament.model';
import { TournamentErrors } from '../../utils/exceptions';
import { isUniqueViolation, withDbErrorHandling } from '../../utils/db-error-handler';
import { runInTransaction } from '../../shared/transaction-runner';

const TOURNAMENT_COLUMNS = `id, user_email, total_rounds, current_round, playoff_kind, playoff_cutoff,
  playoff_reset, version, created_at, updated_at`;

/**
 * Persistence contract for tournaments. The service is the only caller.
 */
export interface ITournamentRepository {
  /**
   * Insert a tournament whose version is 0, otherwise update it if the stored
   * version still matches. Returns the stored tournament with its new version.
   * @throws ConflictException when another write got there first
   */
  save(tournament: Tournament): Promise<Tournament>;
  /**
   * Save the tournament and store the decided match in one transaction; either
   * both land or neither does. participant2 is null for a bye.
   * @throws ConflictException when another write got there first or the
   * pairing already has a result in this round
   */
  recordResult(tournament: Tournament, match: QualificationMatch): Promise<Tournament>;
  findById(id: string): Promise<Tournament | null>;
  findByUserEmail(email: string): Promise<Tournament[]>;
  exists(id: string): Promise<boolean>;
  delete(id: string): Promise<void>;
  loadMatches(tournamentId: string): Promise<QualificationMatch[]>;
  loadBracketData(tournamentId: string): Promise<Playoff | null>;
  /**
   * Write the whole playoff. A playoff at revision 0 may only be written where
   * none exists; later revisions replace the one immediately before them.
   * @throws ConflictException when the stored playoff is not the expected predecessor
   */
  saveBracketData(tournamentId: string, playoff: Playoff): Promise<void>;
}

/**
 * Key that makes a result unique per round: the unordered pair, or the
 * participant alone for a bye.
 */
function matchKey(participant1: CompetitorId, participant2: CompetitorId | null): string {
  return participant2 === null ? participant1 : pairKey(participant1, participant2);
}

export class TournamentRepository implements ITournamentRepository {
  constructor(private readonly db: Pool) {}

  async save(tournament: Tournament): Promise<Tournament> {
    return withDbErrorHandling('save tournament', () =>
      runInTransaction(this.db, async (client) => {
        const row =
          tournament.version === 0
            ? await this.insertTournament(client, tournament)
            : await this.updateTournament(client, tournament);

        const participants = await this.upsertParticipants(client, tournament);
        return tournamentFromDatabase(row, participants);
      })
    );
  }

  async recordResult(tournament: Tournament, match: QualificationMatch): Promise<Tournament> {
    return withDbErrorHandling('record match result', () =>
      runInTransaction(this.db, async (client) => {
        const row = await this.updateTournament(client, tournament);
        const participants = await this.upsertParticipants(client, tournament);
        await this.insertMatch(client, tournament.id, match);
        return tournamentFromDatabase(row, participants);
      })
    );
  }

  private async insertTournament(client: PoolClient, tournament: Tournament): Promise<TournamentRow> {
    const result = await client.query<TournamentRow>(
      `INSERT INTO tournaments
       (id, user_email, total_rounds, current_round, playoff_kind, playoff_cutoff, playoff_reset,
        version, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, 1, $8, $9)
       RETURNING ${TOURNAMENT_COLUMNS}`,
      [
        tournament.id,
        tournament.userEmail,
        tournament.totalRounds,
        tournament.currentRound,
        tournament.playoff.kind,
        tournament.playoff.cutoff,
        tournament.playoff.reset,
        tournament.createdAt,
        tournament.updatedAt,
      ]
    );
    return result.rows[0];
  }

  private async updateTournament(client: PoolClient, tournament: Tournament): Promise<TournamentRow> {
    const result = await client.query<TournamentRow>(
      `UPDATE tournaments
       SET current_round = $3, total_rounds = $4, version = version + 1, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1 AND version = $2
       RETURNING ${TOURNAMENT_COLUMNS}`,
      [tournament.id, tournament.version, tournament.currentRound, tournament.totalRounds]
    );
    if (result.rows.length === 0) {
      throw TournamentErrors.concurrentModification(tournament.id);
    }
    return result.rows[0];
  }

  private async upsertParticipants(
    client: PoolClient,
    tournament: Tournament
  ): Promise<ParticipantRow[]> {
    const rows: ParticipantRow[] = [];
    for (const [position, participant] of tournament.participants.entries()) {
      const result = await client.query<ParticipantRow>(
        `INSERT INTO tournament_participants
         (tournament_id, competitor_id, position, wins, losses, draws, score)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (tournament_id, competitor_id)
         DO UPDATE SET wins = EXCLUDED.wins, losses = EXCLUDED.losses,
                       draws = EXCLUDED.draws, score = EXCLUDED.score
         RETURNING tournament_id, competitor_id, position, wins, losses, draws, score`,
        [
          tournament.id,
          participant.id,
          position,
          participant.wins,
          participant.losses,
          participant.draws,
          participant.score,
        ]
      );
      rows.push(result.rows[0]);
    }
    return rows;
  }

  private async insertMatch(
    client: PoolClient,
    tournamentId: string,
    match: QualificationMatch
  ): Promise<void> {
    const { round, participant1, participant2, result } = match;
    try {
      await client.query(
        `INSERT INTO tournament_matches
         (tournament_id, round_number, participant1, participant2, match_key, outcome, winner)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          tournamentId,
          round,
          participant1,
          participant2,
          matchKey(participant1, participant2),
          result.outcome,
          result.winner,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw participant2 === null
          ? TournamentErrors.byeAlreadyRecorded(participant1, round)
          : TournamentErrors.matchAlreadyRecorded(participant1, participant2, round);
      }
      throw error;
    }
  }

  async findById(id: string): Promise<Tournament | null> {
    return withDbErrorHandling('find tournament', async () => {
      const result = await this.db.query<TournamentRow>(
        `SELECT ${TOURNAMENT_COLUMNS} FROM tournaments WHERE id = $1`,
        [id]
      );
      if (result.rows.length === 0) return null;

      const participants = await this.db.query<ParticipantRow>(
        `SELECT tournament_id, competitor_id, position, wins, losses, draws, score
         FROM tournament_participants WHERE tournament_id = $1 ORDER BY position`,
        [id]
      );
      return tournamentFromDatabase(result.rows[0], participants.rows);
    });
  }

  async findByUserEmail(email: string): Promise<Tournament[]> {
    return withDbErrorHandling('find tournaments by owner', async () => {
      const result = await this.db.query<TournamentRow>(
        `SELECT ${TOURNAMENT_COLUMNS} FROM tournaments WHERE user_email = $1 ORDER BY created_at DESC`,
        [email]
      );
      if (result.rows.length === 0) return [];

      const participants = await this.db.query<ParticipantRow>(
        `SELECT tournament_id, competitor_id, position, wins, losses, draws, score
         FROM tournament_participants WHERE tournament_id = ANY($1::uuid[]) ORDER BY position`,
        [result.rows.map((row) => row.id)]
      );

      const byTournament = new Map<string, ParticipantRow[]>();
      for (const row of participants.rows) {
        const list = byTournament.get(row.tournament_id) ?? [];
        list.push(row);
        byTournament.set(row.tournament_id, list);
      }
      return result.rows.map((row) => tournamentFromDatabase(row, byTournament.get(row.id) ?? []));
    });
  }

  async exists(id: string): Promise<boolean> {
    return withDbErrorHandling('check tournament exists', async () => {
      const result = await this.db.query('SELECT 1 FROM tournaments WHERE id = $1', [id]);
      return result.rows.length > 0;
    });
  }

  async delete(id: string): Promise<void> {
    await withDbErrorHandling('delete tournament', () =>
      this.db.query('DELETE FROM tournaments WHERE id = $1', [id])
    );
  }

  async loadMatches(tournamentId: string): Promise<QualificationMatch[]> {
    return withDbErrorHandling('load matches', async () => {
      const result = await this.db.query<MatchRow>(
        `SELECT tournament_id, round_number, participant1, participant2, outcome, winner
         FROM tournament_matches WHERE tournament_id = $1 ORDER BY round_number, id`,
        [tournamentId]
      );
      return result.rows.map(matchFromDatabase);
    });
  }

  async loadBracketData(tournamentId: string): Promise<Playoff | null> {
    const result = await withDbErrorHandling('load bracket', () =>
      this.db.query<BracketRow>('SELECT bracket_data FROM tournaments WHERE id = $1', [tournamentId])
    );
    const data = result.rows[0]?.bracket_data;
    if (data === null || data === undefined) return null;
    return deserializePlayoff(data, tournamentId);
  }

  async saveBracketData(tournamentId: string, playoff: Playoff): Promise<void> {
    const data = JSON.stringify(serializePlayoff(playoff));
    const revision = playoffRevision(playoff);
    const result = await withDbErrorHandling('save bracket', () =>
      revision === 0
        ? this.db.query(
            `UPDATE tournaments SET bracket_data = $2, updated_at = CURRENT_TIMESTAMP
             WHERE id = $1 AND bracket_data IS NULL`,
            [tournamentId, data]
          )
        : this.db.query(
            `UPDATE tournaments SET bracket_data = $2, updated_at = CURRENT_TIMESTAMP
             WHERE id = $1 AND (bracket_data->>'revision')::int = $3`,
            [tournamentId, data, revision - 1]
          )
    );
    if (!result.rowCount) {
      throw TournamentErrors.concurrentModification(tournamentId);
    }
  }
}
