import { Response } from 'express';
import { TournamentController } from '../../../modules/tournaments/tournament.controller';
import { TournamentService } from '../../../modules/tournaments/tournament.service';
import { AuthRequest } from '../../../middleware/auth.middleware';
import {
  Playoff,
  Tournament,
  createBracket,
  createSingleEliminationBracket,
  toCompetitorId,
} from '../../../domain/tournament';
import { TournamentErrors } from '../../../utils/exceptions';

const TOURNAMENT_ID = '6f1c2b9e-3d4a-4b5c-8d7e-9f0a1b2c3d4e';
const CREATED_AT = new Date('2024-05-04T09:30:00Z');

const createMockService = (): jest.Mocked<TournamentService> =>
  ({
    createTournament: jest.fn(),
    getOwnedTournament: jest.fn(),
    getUserTournaments: jest.fn(),
    deleteTournament: jest.fn(),
    getCurrentRoundPairings: jest.fn(),
    getCurrentStandings: jest.fn(),
    recordMatchResult: jest.fn(),
    isCurrentRoundComplete: jest.fn(),
    getBracket: jest.fn(),
    getNextBracketMatch: jest.fn(),
    recordBracketMatchResult: jest.fn(),
  }) as unknown as jest.Mocked<TournamentService>;

function createRequest(overrides: Partial<AuthRequest> = {}): AuthRequest {
  return {
    user: { userId: 'user-1', email: 'owner@example.com' },
    params: { tournamentId: TOURNAMENT_ID },
    body: {},
    query: {},
    headers: {},
    ...overrides,
  } as unknown as AuthRequest;
}

function createResponse(): Response {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  res.send = jest.fn().mockReturnValue(res);
  return res as Response;
}

function doubleElimination(): Playoff {
  const seeds = Array.from({ length: 16 }, (_, i) => toCompetitorId(`seed${i + 1}`));
  return { kind: 'double-elimination', bracket: createBracket(seeds) };
}

function createTournament(overrides: Partial<Tournament> = {}): Tournament {
  return {
    id: TOURNAMENT_ID,
    userEmail: 'owner@example.com',
    participants: [
      { id: toCompetitorId('mew'), wins: 0, losses: 0, draws: 0, score: 0 },
      { id: toCompetitorId('ditto'), wins: 0, losses: 0, draws: 0, score: 0 },
    ],
    currentRound: 0,
    totalRounds: 3,
    playoff: { kind: 'double-elimination', cutoff: 16, reset: false },
    version: 1,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

describe('TournamentController', () => {
  let service: jest.Mocked<TournamentService>;
  let controller: TournamentController;
  let res: Response;

  beforeEach(() => {
    service = createMockService();
    controller = new TournamentController(service);
    res = createResponse();
    service.getOwnedTournament.mockResolvedValue(createTournament());
  });

  it('should create a tournament for the authenticated user', async () => {
    service.createTournament.mockResolvedValue(createTournament());
    const playoff = { kind: 'double-elimination', cutoff: 16, reset: false };
    const req = createRequest({ params: {}, body: { participants: ['mew', 'ditto'], playoff } });

    await controller.createTournament(req, res);

    expect(service.createTournament).toHaveBeenCalledWith(['mew', 'ditto'], 'owner@example.com', playoff);
    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith({
      id: TOURNAMENT_ID,
      user_email: 'owner@example.com',
      participants: [
        { id: 'mew', wins: 0, losses: 0, draws: 0, score: 0 },
        { id: 'ditto', wins: 0, losses: 0, draws: 0, score: 0 },
      ],
      current_round: 0,
      total_rounds: 3,
      is_complete: false,
      playoff: { kind: 'double-elimination', cutoff: 16, reset: false },
      version: 1,
      created_at: CREATED_AT,
      updated_at: CREATED_AT,
    });
  });

  it('should list summaries of the caller tournaments', async () => {
    service.getUserTournaments.mockResolvedValue([createTournament({ currentRound: 3 })]);

    await controller.getMyTournaments(createRequest({ params: {} }), res);

    expect(res.json).toHaveBeenCalledWith([
      {
        id: TOURNAMENT_ID,
        participant_count: 2,
        current_round: 3,
        total_rounds: 3,
        is_complete: true,
        created_at: CREATED_AT,
      },
    ]);
  });

  it('should check ownership before every tournament operation', async () => {
    service.getOwnedTournament.mockRejectedValue(TournamentErrors.notOwner());

    await expect(controller.getPairings(createRequest(), res)).rejects.toMatchObject({
      statusCode: 403,
    });
    expect(service.getOwnedTournament).toHaveBeenCalledWith(TOURNAMENT_ID, 'owner@example.com');
    expect(service.getCurrentRoundPairings).not.toHaveBeenCalled();
  });

  it('should render pairings with byes flagged', async () => {
    service.getCurrentRoundPairings.mockResolvedValue([
      [toCompetitorId('ditto'), toCompetitorId('mew')],
      [toCompetitorId('zubat')],
    ]);

    await controller.getPairings(createRequest(), res);

    expect(res.json).toHaveBeenCalledWith({
      round: 0,
      pairings: [
        { participant1: 'ditto', participant2: 'mew', is_bye: false },
        { participant1: 'zubat', participant2: null, is_bye: true },
      ],
    });
  });

  it('should pass the validated match body through', async () => {
    service.recordMatchResult.mockResolvedValue(createTournament({ version: 2 }));
    const req = createRequest({
      body: { participant1: 'mew', participant2: 'ditto', outcome: 'draw', winner: null },
    });

    await controller.recordMatch(req, res);

    expect(service.recordMatchResult).toHaveBeenCalledWith(TOURNAMENT_ID, 'mew', 'ditto', 'draw', null);
    expect(res.status).toHaveBeenCalledWith(201);
  });

  it('should report round status', async () => {
    service.isCurrentRoundComplete.mockResolvedValue(false);

    await controller.getRoundStatus(createRequest(), res);

    expect(res.json).toHaveBeenCalledWith({
      current_round: 0,
      total_rounds: 3,
      is_round_complete: false,
      is_complete: false,
    });
  });

  it('should answer BRACKET_NOT_INITIALIZED when no bracket exists', async () => {
    service.getBracket.mockResolvedValue(null);

    await expect(controller.getBracket(createRequest(), res)).rejects.toMatchObject({
      statusCode: 409,
      errorCode: 'BRACKET_NOT_INITIALIZED',
    });
  });

  it('should render the bracket by ladder and round', async () => {
    service.getBracket.mockResolvedValue(doubleElimination());

    await controller.getBracket(createRequest(), res);

    const body = (res.json as jest.Mock).mock.calls[0][0];
    expect(body.kind).toBe('double-elimination');
    expect(body.winners).toHaveLength(4);
    expect(body.winners[0].matches).toHaveLength(8);
    expect(body.winners[0].matches[0]).toEqual({
      id: 'w1_1',
      ladder: 'winners',
      round: 1,
      participant1: 'seed1',
      participant2: 'seed16',
      winner: null,
    });
    expect(body.losers.map((r: { round: number }) => r.round)).toEqual([1, 2, 3, 4, 5]);
    expect(body.grand_final).toBeNull();
    expect(body.grand_final_reset).toBeNull();
    expect(body.reset).toBe(false);
    expect(body.is_complete).toBe(false);
    expect(body.champion).toBeNull();
    expect(body.revision).toBe(0);
  });

  it('should render a single-elimination playoff by round', async () => {
    const seeds = ['mew', 'ditto', 'abra', 'zubat'].map(toCompetitorId);
    service.getBracket.mockResolvedValue({
      kind: 'single-elimination',
      bracket: createSingleEliminationBracket(seeds),
    });

    await controller.getBracket(createRequest(), res);

    expect(res.json).toHaveBeenCalledWith({
      kind: 'single-elimination',
      rounds: [
        {
          round: 1,
          matches: [
            { id: 'r1_1', ladder: null, round: 1, participant1: 'mew', participant2: 'zubat', winner: null },
            { id: 'r1_2', ladder: null, round: 1, participant1: 'ditto', participant2: 'abra', winner: null },
          ],
        },
      ],
      current_round: 1,
      is_complete: false,
      champion: null,
      revision: 0,
    });
  });

  it('should return null when no bracket match is waiting', async () => {
    service.getNextBracketMatch.mockResolvedValue(null);

    await controller.getNextBracketMatch(createRequest(), res);

    expect(res.json).toHaveBeenCalledWith({ match: null });
  });

  it('should record a bracket result for the match in the path', async () => {
    service.recordBracketMatchResult.mockResolvedValue(doubleElimination());
    const req = createRequest({
      params: { tournamentId: TOURNAMENT_ID, matchId: 'w1_3' },
      body: { winner: 'seed3' },
    });

    await controller.recordBracketMatch(req, res);

    expect(service.recordBracketMatchResult).toHaveBeenCalledWith(TOURNAMENT_ID, 'w1_3', 'seed3');
    expect(res.status).toHaveBeenCalledWith(200);
  });

  it('should delete and answer 204', async () => {
    service.deleteTournament.mockResolvedValue(undefined);

    await controller.deleteTournament(createRequest(), res);

    expect(service.deleteTournament).toHaveBeenCalledWith(TOURNAMENT_ID);
    expect(res.status).toHaveBeenCalledWith(204);
    expect(res.send).toHaveBeenCalled();
  });
});
