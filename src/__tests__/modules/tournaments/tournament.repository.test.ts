import { Pool, PoolClient } from 'pg';
import { TournamentRepository } from '../../../modules/tournaments/tournament.repository';
import {
  Playoff,
  QualificationMatch,
  Tournament,
  createBracket,
  createSingleEliminationBracket,
  recordBracketResult,
  serializePlayoff,
  toCompetitorId,
} from '../../../domain/tournament';

const TOURNAMENT_ID = '6f1c2b9e-3d4a-4b5c-8d7e-9f0a1b2c3d4e';
const CREATED_AT = new Date('2024-03-01T12:00:00Z');

type QueryResultLike = { rows: unknown[]; rowCount?: number };

const createMockClient = () =>
  ({
    query: jest.fn(),
    release: jest.fn(),
  }) as unknown as jest.Mocked<PoolClient>;

const createMockPool = (client: PoolClient) =>
  ({
    query: jest.fn(),
    connect: jest.fn().mockResolvedValue(client),
  }) as unknown as jest.Mocked<Pool>;

function createTournament(overrides: Partial<Tournament> = {}): Tournament {
  return {
    id: TOURNAMENT_ID,
    userEmail: 'owner@example.com',
    participants: [
      { id: toCompetitorId('bulbasaur'), wins: 1, losses: 0, draws: 0, score: 3 },
      { id: toCompetitorId('charmander'), wins: 0, losses: 1, draws: 0, score: 0 },
    ],
    currentRound: 1,
    totalRounds: 3,
    playoff: { kind: 'single-elimination', cutoff: 8, reset: false },
    version: 0,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

const tournamentRow = (version: number, playoffKind = 'single-elimination') => ({
  id: TOURNAMENT_ID,
  user_email: 'owner@example.com',
  total_rounds: 3,
  current_round: 1,
  playoff_kind: playoffKind,
  playoff_cutoff: 8,
  playoff_reset: false,
  version,
  created_at: CREATED_AT,
  updated_at: CREATED_AT,
});

/**
 * Answer the statements save() and recordResult() issue, echoing participant
 * upserts back as rows. matchInsertError makes the match insert fail.
 */
function answerSaveQueries(
  client: jest.Mocked<PoolClient>,
  tournamentRows: unknown[],
  matchInsertError?: Error
) {
  const query = client.query as unknown as jest.Mock<Promise<QueryResultLike>, [string, unknown[]?]>;
  query.mockImplementation(async (sql, params = []) => {
    if (sql.includes('INSERT INTO tournament_matches') && matchInsertError) {
      throw matchInsertError;
    }
    if (sql.includes('tournament_participants')) {
      const [tournament_id, competitor_id, position, wins, losses, draws, score] = params;
      return { rows: [{ tournament_id, competitor_id, position, wins, losses, draws, score }] };
    }
    if (sql.includes('INSERT INTO tournaments') || sql.includes('UPDATE tournaments')) {
      return { rows: tournamentRows };
    }
    return { rows: [] };
  });
  return query;
}

describe('TournamentRepository', () => {
  let client: jest.Mocked<PoolClient>;
  let pool: jest.Mocked<Pool>;
  let repo: TournamentRepository;
  let poolQuery: jest.Mock<Promise<QueryResultLike>, [string, unknown[]?]>;

  beforeEach(() => {
    client = createMockClient();
    pool = createMockPool(client);
    poolQuery = pool.query as unknown as jest.Mock<Promise<QueryResultLike>, [string, unknown[]?]>;
    repo = new TournamentRepository(pool);
  });

  describe('save', () => {
    it('should insert a new tournament and its participants in one transaction', async () => {
      const query = answerSaveQueries(client, [tournamentRow(1)]);

      const saved = await repo.save(createTournament());

      expect(saved.version).toBe(1);
      expect(saved.playoff).toEqual({ kind: 'single-elimination', cutoff: 8, reset: false });
      const insert = query.mock.calls.find(([sql]) => sql.includes('INSERT INTO tournaments'));
      expect(insert?.[1]).toEqual([
        TOURNAMENT_ID,
        'owner@example.com',
        3,
        1,
        'single-elimination',
        8,
        false,
        CREATED_AT,
        CREATED_AT,
      ]);
      expect(saved.participants).toEqual([
        { id: 'bulbasaur', wins: 1, losses: 0, draws: 0, score: 3 },
        { id: 'charmander', wins: 0, losses: 1, draws: 0, score: 0 },
      ]);
      const statements = query.mock.calls.map(([sql]) => sql.trim().split(/\s+/).slice(0, 3).join(' '));
      expect(statements).toEqual([
        'BEGIN',
        'INSERT INTO tournaments',
        'INSERT INTO tournament_participants',
        'INSERT INTO tournament_participants',
        'COMMIT',
      ]);
      expect(client.release).toHaveBeenCalled();
    });

    it('should update against the expected version', async () => {
      const query = answerSaveQueries(client, [tournamentRow(3)]);

      const saved = await repo.save(createTournament({ version: 2 }));

      expect(saved.version).toBe(3);
      const update = query.mock.calls.find(([sql]) => sql.includes('UPDATE tournaments'));
      expect(update?.[1]).toEqual([TOURNAMENT_ID, 2, 1, 3]);
    });

    it('should roll back and report a conflict when the version moved', async () => {
      const query = answerSaveQueries(client, []);

      await expect(repo.save(createTournament({ version: 2 }))).rejects.toMatchObject({
        statusCode: 409,
        errorCode: 'CONCURRENT_MODIFICATION',
      });
      expect(query).toHaveBeenCalledWith('ROLLBACK');
      expect(query).not.toHaveBeenCalledWith('COMMIT');
      expect(client.release).toHaveBeenCalled();
    });
  });

  describe('findById', () => {
    it('should return null for an unknown tournament', async () => {
      poolQuery.mockResolvedValueOnce({ rows: [] });

      expect(await repo.findById(TOURNAMENT_ID)).toBeNull();
      expect(poolQuery).toHaveBeenCalledTimes(1);
    });

    it('should restore participants in stored position order', async () => {
      poolQuery.mockResolvedValueOnce({ rows: [tournamentRow(4)] }).mockResolvedValueOnce({
        rows: [
          { tournament_id: TOURNAMENT_ID, competitor_id: 'squirtle', position: 1, wins: 0, losses: 0, draws: 2, score: 2 },
          { tournament_id: TOURNAMENT_ID, competitor_id: 'eevee', position: 0, wins: 2, losses: 0, draws: 0, score: 6 },
        ],
      });

      const tournament = await repo.findById(TOURNAMENT_ID);

      expect(tournament?.participants.map((p) => p.id)).toEqual(['eevee', 'squirtle']);
      expect(tournament?.version).toBe(4);
    });

    it('should refuse a stored row with an unknown playoff kind', async () => {
      poolQuery
        .mockResolvedValueOnce({ rows: [tournamentRow(4, 'round-robin')] })
        .mockResolvedValueOnce({ rows: [] });

      await expect(repo.findById(TOURNAMENT_ID)).rejects.toMatchObject({
        errorCode: 'DATABASE_ERROR',
        message: `Tournament ${TOURNAMENT_ID} has unknown playoff kind round-robin`,
      });
    });

    it('should wrap driver errors in a DatabaseException', async () => {
      poolQuery.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(repo.findById(TOURNAMENT_ID)).rejects.toMatchObject({
        statusCode: 500,
        errorCode: 'DATABASE_ERROR',
        message: 'Database operation failed: find tournament',
      });
    });
  });

  describe('recordResult', () => {
    const pairMatch: QualificationMatch = {
      round: 2,
      participant1: toCompetitorId('pidgey'),
      participant2: toCompetitorId('abra'),
      result: { outcome: 'win', winner: toCompetitorId('abra') },
    };

    it('should update the tournament, its participants and the match in one transaction', async () => {
      const query = answerSaveQueries(client, [tournamentRow(3)]);

      const saved = await repo.recordResult(createTournament({ version: 2 }), pairMatch);

      expect(saved.version).toBe(3);
      const statements = query.mock.calls.map(([sql]) => sql.trim().split(/\s+/).slice(0, 3).join(' '));
      expect(statements).toEqual([
        'BEGIN',
        'UPDATE tournaments SET',
        'INSERT INTO tournament_participants',
        'INSERT INTO tournament_participants',
        'INSERT INTO tournament_matches',
        'COMMIT',
      ]);
      expect(poolQuery).not.toHaveBeenCalled();
    });

    it('should key a pairing by its sorted identifiers', async () => {
      const query = answerSaveQueries(client, [tournamentRow(3)]);

      await repo.recordResult(createTournament({ version: 2 }), pairMatch);

      const insert = query.mock.calls.find(([sql]) => sql.includes('INSERT INTO tournament_matches'));
      expect(insert?.[1]).toEqual([TOURNAMENT_ID, 2, 'pidgey', 'abra', 'abra:pidgey', 'win', 'abra']);
    });

    it('should key a bye by its single participant', async () => {
      const query = answerSaveQueries(client, [tournamentRow(3)]);
      const onix = toCompetitorId('onix');

      await repo.recordResult(createTournament({ version: 2 }), {
        round: 0,
        participant1: onix,
        participant2: null,
        result: { outcome: 'win', winner: onix },
      });

      const insert = query.mock.calls.find(([sql]) => sql.includes('INSERT INTO tournament_matches'));
      expect(insert?.[1]).toEqual([TOURNAMENT_ID, 0, 'onix', null, 'onix', 'win', 'onix']);
    });

    it('should roll back the standings when the match insert hits a unique violation', async () => {
      const query = answerSaveQueries(
        client,
        [tournamentRow(3)],
        Object.assign(new Error('duplicate key'), { code: '23505' })
      );

      await expect(repo.recordResult(createTournament({ version: 2 }), pairMatch)).rejects.toMatchObject({
        statusCode: 409,
        errorCode: 'MATCH_ALREADY_RECORDED',
        message: 'A result for pidgey vs abra was already recorded in round 2',
      });
      expect(query).toHaveBeenCalledWith('ROLLBACK');
      expect(query).not.toHaveBeenCalledWith('COMMIT');
      expect(client.release).toHaveBeenCalled();
    });

    it('should roll back and wrap a failed match insert', async () => {
      const query = answerSaveQueries(client, [tournamentRow(3)], new Error('connection reset'));

      await expect(repo.recordResult(createTournament({ version: 2 }), pairMatch)).rejects.toMatchObject({
        statusCode: 500,
        errorCode: 'DATABASE_ERROR',
        message: 'Database operation failed: record match result',
      });
      expect(query).toHaveBeenCalledWith('ROLLBACK');
      expect(query).not.toHaveBeenCalledWith('COMMIT');
    });

    it('should store no match when the version moved', async () => {
      const query = answerSaveQueries(client, []);

      await expect(repo.recordResult(createTournament({ version: 2 }), pairMatch)).rejects.toMatchObject({
        errorCode: 'CONCURRENT_MODIFICATION',
      });
      expect(query.mock.calls.some(([sql]) => sql.includes('tournament_matches'))).toBe(false);
      expect(query).toHaveBeenCalledWith('ROLLBACK');
    });
  });

  describe('matches', () => {
    it('should map stored rows to matches', async () => {
      poolQuery.mockResolvedValueOnce({
        rows: [
          { tournament_id: TOURNAMENT_ID, round_number: 0, participant1: 'abra', participant2: 'pidgey', outcome: 'loss', winner: 'pidgey' },
          { tournament_id: TOURNAMENT_ID, round_number: 0, participant1: 'onix', participant2: null, outcome: 'win', winner: 'onix' },
        ],
      });

      expect(await repo.loadMatches(TOURNAMENT_ID)).toEqual([
        { round: 0, participant1: 'abra', participant2: 'pidgey', result: { outcome: 'loss', winner: 'pidgey' } },
        { round: 0, participant1: 'onix', participant2: null, result: { outcome: 'win', winner: 'onix' } },
      ]);
    });

    it('should refuse a stored row with an unknown outcome', async () => {
      poolQuery.mockResolvedValueOnce({
        rows: [
          { tournament_id: TOURNAMENT_ID, round_number: 0, participant1: 'abra', participant2: 'pidgey', outcome: 'forfeit', winner: null },
        ],
      });

      await expect(repo.loadMatches(TOURNAMENT_ID)).rejects.toMatchObject({
        errorCode: 'DATABASE_ERROR',
        message: 'Stored match has unknown outcome forfeit',
      });
    });
  });

  describe('bracket data', () => {
    const seeds = Array.from({ length: 16 }, (_, i) => toCompetitorId(`seed${i + 1}`));

    it('should return null when no bracket is stored', async () => {
      poolQuery.mockResolvedValueOnce({ rows: [{ bracket_data: null }] });

      expect(await repo.loadBracketData(TOURNAMENT_ID)).toBeNull();
    });

    it('should decode a stored playoff', async () => {
      const playoff: Playoff = {
        kind: 'double-elimination',
        bracket: recordBracketResult(createBracket(seeds), 'w1_1', seeds[0]),
      };
      poolQuery.mockResolvedValueOnce({
        rows: [{ bracket_data: JSON.parse(JSON.stringify(serializePlayoff(playoff))) }],
      });

      const loaded = await repo.loadBracketData(TOURNAMENT_ID);

      expect(loaded).toEqual(playoff);
    });

    it('should reject a corrupt bracket', async () => {
      poolQuery.mockResolvedValueOnce({
        rows: [{ bracket_data: { revision: 0, winners: [], losers: [], grandFinal: null } }],
      });

      await expect(repo.loadBracketData(TOURNAMENT_ID)).rejects.toMatchObject({
        statusCode: 500,
        errorCode: 'DATABASE_ERROR',
      });
    });

    it('should only write a fresh bracket where none exists', async () => {
      poolQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

      const playoff: Playoff = {
        kind: 'single-elimination',
        bracket: createSingleEliminationBracket(seeds.slice(0, 8)),
      };

      await expect(repo.saveBracketData(TOURNAMENT_ID, playoff)).rejects.toMatchObject({
        errorCode: 'CONCURRENT_MODIFICATION',
      });
      expect(poolQuery.mock.calls[0][0]).toContain('bracket_data IS NULL');
    });

    it('should replace the previous revision', async () => {
      poolQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
      const playoff: Playoff = {
        kind: 'double-elimination',
        bracket: recordBracketResult(createBracket(seeds), 'w1_1', seeds[15]),
      };

      await repo.saveBracketData(TOURNAMENT_ID, playoff);

      const [sql, params] = poolQuery.mock.calls[0];
      expect(sql).toContain("(bracket_data->>'revision')::int = $3");
      expect(params?.[2]).toBe(0);
      expect(JSON.parse(String(params?.[1]))).toEqual(serializePlayoff(playoff));
    });
  });
});
