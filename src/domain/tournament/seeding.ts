/**
 * Playoff Seeding Domain Logic
 *
 * Cuts qualification standings down to a seeded top-N and builds the playoff
 * bracket from it. No async I/O, no database access.
 */
import { CompetitorId } from './competitor';
import { Participant, PlayoffSettings, createParticipant } from './entities';
import { Standings, sortStandingsByTieBreaker } from './swiss';
import { DOUBLE_ELIMINATION_SIZE, createBracket } from './double-elimination';
import { createSingleEliminationBracket } from './single-elimination';
import { Playoff } from './playoff';
import { BracketErrors } from '../../utils/exceptions';

export const DEFAULT_PLAYOFF: PlayoffSettings = {
  kind: 'double-elimination',
  cutoff: DOUBLE_ELIMINATION_SIZE,
  reset: false,
};

export interface SeededPlayoff {
  seeds: Participant[];
  playoff: Playoff;
}

/**
 * What is wrong with a set of playoff settings, or null when they are usable.
 */
export function playoffSettingsProblem(settings: PlayoffSettings): string | null {
  const { kind, cutoff, reset } = settings;
  if (!Number.isInteger(cutoff) || cutoff < 2 || (cutoff & (cutoff - 1)) !== 0) {
    return 'playoff cutoff must be a power of two of at least 2';
  }
  if (kind === 'double-elimination' && cutoff !== DOUBLE_ELIMINATION_SIZE) {
    return `double elimination takes exactly ${DOUBLE_ELIMINATION_SIZE} qualifiers`;
  }
  if (kind === 'single-elimination' && reset) {
    return 'grand final reset only applies to double elimination';
  }
  return null;
}

/**
 * @throws ValidationException when the settings cannot build a bracket
 */
export function validatePlayoffSettings(settings: PlayoffSettings): PlayoffSettings {
  const problem = playoffSettingsProblem(settings);
  if (problem) {
    throw BracketErrors.invalidPlayoff(problem);
  }
  return settings;
}

/**
 * Top N by score DESC, identifier ASC. Standings entries missing from the pool
 * get a fresh placeholder participant.
 *
 * @param pool - Known participants
 * @param standings - Score per competitor; decides who is seeded
 * @param topN - Number of seeds, at least 2
 */
export function seedTopN(
  pool: readonly Participant[],
  standings: Standings,
  topN: number
): Participant[] {
  if (!Number.isInteger(topN) || topN < 2) {
    throw BracketErrors.invalidSize('at least 2', topN);
  }

  const byId = new Map(pool.map((p) => [p.id, p]));
  return sortStandingsByTieBreaker(standings, [...standings.keys()])
    .slice(0, topN)
    .map(({ participant }) => byId.get(participant) ?? createParticipant(participant));
}

/**
 * Standings map for a set of participants, from their current scores.
 */
export function standingsFromParticipants(
  participants: readonly Participant[]
): Map<CompetitorId, number> {
  return new Map(participants.map((p) => [p.id, p.score]));
}

/**
 * Seed the top `settings.cutoff` and build the bracket of the requested kind.
 *
 * @throws ValidationException for unusable settings
 * @throws ConflictException when standings hold fewer competitors than the cutoff
 */
export function buildPlayoffBracket(
  pool: readonly Participant[],
  standings: Standings,
  settings: PlayoffSettings
): SeededPlayoff {
  const { kind, cutoff, reset } = validatePlayoffSettings(settings);
  const seeds = seedTopN(pool, standings, cutoff);
  if (seeds.length < cutoff) {
    throw BracketErrors.insufficientQualifiers(cutoff, seeds.length);
  }

  const ids = seeds.map((p) => p.id);
  const playoff: Playoff =
    kind === 'double-elimination'
      ? { kind, bracket: createBracket(ids, { reset }) }
      : { kind, bracket: createSingleEliminationBracket(ids) };
  return { seeds, playoff };
}
