export {
  competitorIdSchema,
  toCompetitorId,
  toCompetitorIds,
  compareCompetitorIds,
  pairKey,
  MAX_COMPETITOR_ID_LENGTH,
  type CompetitorId,
} from './competitor';

export {
  MATCH_OUTCOMES,
  PLAYOFF_KINDS,
  isOutcome,
  isPlayoffKind,
  createParticipant,
  recordWin,
  recordLoss,
  recordDraw,
  isTournamentComplete,
  advanceRound,
  findParticipant,
  hasParticipant,
  withParticipants,
  resolveMatchResult,
  applyResult,
  scoreDeltas,
  toStanding,
  type MatchOutcome,
  type MatchResult,
  type Participant,
  type QualificationMatch,
  type Tournament,
  type ParticipantStanding,
  type Pairing,
  type PlayoffKind,
  type PlayoffSettings,
} from './entities';

export {
  generatePairings,
  calculateTotalRounds,
  sortStandingsByTieBreaker,
  getScoreForResult,
  calculateStandings,
  MIN_ROUNDS,
  MAX_ROUNDS,
  type Standings,
  type ScoredCompetitor,
  type RawResult,
} from './swiss';

export {
  createBracket,
  recordMatchResult as recordBracketResult,
  getMatchesReadyForVoting,
  isBracketComplete,
  getBracketChampion,
  listBracketMatches,
  isMatchReady,
  bracketMatchId,
  DOUBLE_ELIMINATION_SIZE,
  WINNER_LADDER_ROUNDS,
  LOSER_LADDER_ROUNDS,
  GRAND_FINAL_ID,
  GRAND_FINAL_RESET_ID,
  type Bracket,
  type BracketMatch,
  type BracketOptions,
  type Ladder,
} from './double-elimination';

export {
  serializeBracket,
  deserializeBracket,
  serializePlayoff,
  deserializePlayoff,
  type StoredBracket,
  type StoredBracketMatch,
  type StoredPlayoff,
  type StoredSingleEliminationBracket,
} from './bracket-codec';

export {
  createSingleEliminationBracket,
  recordSingleEliminationResult,
  advanceSingleEliminationRound,
  isSingleEliminationComplete,
  getSingleEliminationChampion,
  getCurrentRoundMatches,
  type SingleEliminationBracket,
  type SingleEliminationMatch,
} from './single-elimination';

export {
  playoffRevision,
  getNextPlayoffMatch,
  recordPlayoffResult,
  isPlayoffComplete,
  getPlayoffChampion,
  type Playoff,
  type PlayoffMatch,
} from './playoff';

export {
  DEFAULT_PLAYOFF,
  seedTopN,
  standingsFromParticipants,
  playoffSettingsProblem,
  validatePlayoffSettings,
  buildPlayoffBracket,
  type SeededPlayoff,
} from './seeding';
