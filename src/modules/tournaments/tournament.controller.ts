import { Response } from 'express';
import { AuthRequest } from '../../middleware/auth.middleware';
import { TournamentService } from './tournament.service';
import { requireTournamentId, requireUserEmail } from '../../utils/controller-helpers';
import { getParam } from '../../utils/params';
import { BracketErrors } from '../../utils/exceptions';
import {
  CreateTournamentInput,
  RecordBracketResultInput,
  RecordByeInput,
  RecordMatchInput,
} from './tournament.schemas';
import {
  matchToResponse,
  pairingToResponse,
  playoffMatchToResponse,
  playoffToResponse,
  standingToResponse,
  tournamentSummaryToResponse,
  tournamentToResponse,
} from './tournament.model';

export class TournamentController {
  constructor(private readonly tournamentService: TournamentService) {}

  /**
   * Resolve the tournament ID and check the caller owns it.
   */
  private async ownedTournament(req: AuthRequest) {
    const tournamentId = requireTournamentId(req);
    return this.tournamentService.getOwnedTournament(tournamentId, requireUserEmail(req));
  }

  createTournament = async (req: AuthRequest, res: Response) => {
    const userEmail = requireUserEmail(req);
    // req.body is already validated by validateRequest(createTournamentSchema)
    const { participants, playoff } = req.body as CreateTournamentInput;

    const tournament = await this.tournamentService.createTournament(participants, userEmail, playoff);
    res.status(201).json(tournamentToResponse(tournament));
  };

  getMyTournaments = async (req: AuthRequest, res: Response) => {
    const userEmail = requireUserEmail(req);
    const tournaments = await this.tournamentService.getUserTournaments(userEmail);
    res.status(200).json(tournaments.map(tournamentSummaryToResponse));
  };

  getTournament = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    res.status(200).json(tournamentToResponse(tournament));
  };

  deleteTournament = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    await this.tournamentService.deleteTournament(tournament.id);
    res.status(204).send();
  };

  getPairings = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const pairings = await this.tournamentService.getCurrentRoundPairings(tournament.id);
    res.status(200).json({
      round: tournament.currentRound,
      pairings: pairings.map(pairingToResponse),
    });
  };

  getStandings = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const standings = await this.tournamentService.getCurrentStandings(tournament.id);
    res.status(200).json(standings.map(standingToResponse));
  };

  getFinalStandings = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const standings = await this.tournamentService.getFinalStandings(tournament.id);
    res.status(200).json(standings.map(standingToResponse));
  };

  getMatches = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const matches = await this.tournamentService.getQualificationMatches(tournament.id);
    res.status(200).json(matches.map(matchToResponse));
  };

  recordMatch = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const { participant1, participant2, outcome, winner } = req.body as RecordMatchInput;

    const updated = await this.tournamentService.recordMatchResult(
      tournament.id,
      participant1,
      participant2,
      outcome,
      winner
    );
    res.status(201).json(tournamentToResponse(updated));
  };

  recordBye = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const { participant } = req.body as RecordByeInput;

    const updated = await this.tournamentService.recordBye(tournament.id, participant);
    res.status(201).json(tournamentToResponse(updated));
  };

  getRoundStatus = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const roundComplete = await this.tournamentService.isCurrentRoundComplete(tournament.id);
    res.status(200).json({
      current_round: tournament.currentRound,
      total_rounds: tournament.totalRounds,
      is_round_complete: roundComplete,
      is_complete: tournament.currentRound >= tournament.totalRounds,
    });
  };

  advanceRound = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const updated = await this.tournamentService.advanceToNextRound(tournament.id);
    res.status(200).json(tournamentToResponse(updated));
  };

  initializeBracket = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const playoff = await this.tournamentService.initializeBracket(tournament.id);
    res.status(201).json(playoffToResponse(playoff));
  };

  getBracket = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const playoff = await this.tournamentService.getBracket(tournament.id);
    if (!playoff) {
      throw BracketErrors.notInitialized(tournament.id);
    }
    res.status(200).json(playoffToResponse(playoff));
  };

  getNextBracketMatch = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const match = await this.tournamentService.getNextBracketMatch(tournament.id);
    res.status(200).json({ match: match ? playoffMatchToResponse(match) : null });
  };

  recordBracketMatch = async (req: AuthRequest, res: Response) => {
    const tournament = await this.ownedTournament(req);
    const matchId = getParam(req.params.matchId);
    const { winner } = req.body as RecordBracketResultInput;

    const playoff = await this.tournamentService.recordBracketMatchResult(
      tournament.id,
      matchId,
      winner
    );
    res.status(200).json(playoffToResponse(playoff));
  };
}
