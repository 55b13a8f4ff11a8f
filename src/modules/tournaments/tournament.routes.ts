import { Router } from 'express';
import { TournamentController } from './tournament.controller';
import { TournamentService } from './tournament.service';
import { authMiddleware } from '../../middleware/auth.middleware';
import { validateRequest } from '../../middleware/validation.middleware';
import { asyncHandler } from '../../shared/async-handler';
import {
  bracketMatchParamsSchema,
  createTournamentSchema,
  recordBracketResultSchema,
  recordByeSchema,
  recordMatchSchema,
  tournamentParamsSchema,
} from './tournament.schemas';
import { container, KEYS } from '../../container';

export function createTournamentRoutes(controller: TournamentController): Router {
  const router = Router();
  const byId = validateRequest(tournamentParamsSchema, 'params');

  // All tournament routes require authentication
  router.use(authMiddleware);

  // POST /api/tournaments
  router.post('/', validateRequest(createTournamentSchema), asyncHandler(controller.createTournament));

  // GET /api/tournaments - Tournaments owned by the caller
  router.get('/', asyncHandler(controller.getMyTournaments));

  // GET /api/tournaments/:tournamentId
  router.get('/:tournamentId', byId, asyncHandler(controller.getTournament));

  // DELETE /api/tournaments/:tournamentId
  router.delete('/:tournamentId', byId, asyncHandler(controller.deleteTournament));

  // Qualification
  router.get('/:tournamentId/pairings', byId, asyncHandler(controller.getPairings));
  router.get('/:tournamentId/standings', byId, asyncHandler(controller.getStandings));
  router.get('/:tournamentId/standings/final', byId, asyncHandler(controller.getFinalStandings));
  router.get('/:tournamentId/matches', byId, asyncHandler(controller.getMatches));
  router.post(
    '/:tournamentId/matches',
    byId,
    validateRequest(recordMatchSchema),
    asyncHandler(controller.recordMatch)
  );
  router.post(
    '/:tournamentId/byes',
    byId,
    validateRequest(recordByeSchema),
    asyncHandler(controller.recordBye)
  );
  router.get('/:tournamentId/round', byId, asyncHandler(controller.getRoundStatus));
  router.post('/:tournamentId/round/advance', byId, asyncHandler(controller.advanceRound));

  // Playoff bracket
  router.post('/:tournamentId/bracket', byId, asyncHandler(controller.initializeBracket));
  router.get('/:tournamentId/bracket', byId, asyncHandler(controller.getBracket));
  router.get('/:tournamentId/bracket/next', byId, asyncHandler(controller.getNextBracketMatch));
  router.post(
    '/:tournamentId/bracket/matches/:matchId',
    validateRequest(bracketMatchParamsSchema, 'params'),
    validateRequest(recordBracketResultSchema),
    asyncHandler(controller.recordBracketMatch)
  );

  return router;
}

// Resolve dependencies from container
const tournamentService = container.resolve<TournamentService>(KEYS.TOURNAMENT_SERVICE);

export default createTournamentRoutes(new TournamentController(tournamentService));
