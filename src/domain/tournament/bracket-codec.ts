/**
 * Playoff storage form.
 *
 * Nested rounds per ladder, competitors reduced to their canonical string,
 * tagged with the playoff kind. Decoding rebuilds the id map and rejects
 * anything inconsistent.
 */
import { z } from 'zod';
import { competitorIdSchema } from './competitor';
import {
  Bracket,
  BracketMatch,
  GRAND_FINAL_ID,
  GRAND_FINAL_RESET_ID,
  LOSER_LADDER_ROUNDS,
  WINNER_LADDER_ROUNDS,
  bracketMatchId,
} from './double-elimination';
import { SingleEliminationBracket, SingleEliminationMatch } from './single-elimination';
import { Playoff } from './playoff';
import { BracketErrors } from '../../utils/exceptions';

const storedMatchSchema = z.object({
  id: z.string().min(1),
  participant1: competitorIdSchema.nullable(),
  participant2: competitorIdSchema.nullable(),
  winner: competitorIdSchema.nullable(),
});

const storedBracketSchema = z.object({
  revision: z.number().int().min(0),
  reset: z.boolean(),
  winners: z.array(z.array(storedMatchSchema)).length(WINNER_LADDER_ROUNDS),
  losers: z.array(z.array(storedMatchSchema)).length(LOSER_LADDER_ROUNDS),
  grandFinal: storedMatchSchema.nullable(),
  grandFinalReset: storedMatchSchema.nullable(),
});

const storedSingleEliminationSchema = z.object({
  revision: z.number().int().min(0),
  currentRound: z.number().int().min(1),
  rounds: z.array(z.array(storedMatchSchema).min(1)).min(1),
});

const storedPlayoffSchema = z.discriminatedUnion('kind', [
  storedBracketSchema.extend({ kind: z.literal('double-elimination') }),
  storedSingleEliminationSchema.extend({ kind: z.literal('single-elimination') }),
]);

type ParsedMatch = z.infer<typeof storedMatchSchema>;

export interface StoredBracketMatch {
  id: string;
  participant1: string | null;
  participant2: string | null;
  winner: string | null;
}

export interface StoredBracket {
  revision: number;
  reset: boolean;
  winners: StoredBracketMatch[][];
  losers: StoredBracketMatch[][];
  grandFinal: StoredBracketMatch | null;
  grandFinalReset: StoredBracketMatch | null;
}

export interface StoredSingleEliminationBracket {
  revision: number;
  currentRound: number;
  rounds: StoredBracketMatch[][];
}

export type StoredPlayoff =
  | ({ kind: 'double-elimination' } & StoredBracket)
  | ({ kind: 'single-elimination' } & StoredSingleEliminationBracket);

function toStoredMatch(match: BracketMatch | SingleEliminationMatch): StoredBracketMatch {
  return {
    id: match.id,
    participant1: match.participant1,
    participant2: match.participant2,
    winner: match.winner,
  };
}

export function serializeBracket(bracket: Bracket): StoredBracket {
  const storeOne = (id: string | null) => {
    const match = id ? bracket.matches.get(id) : undefined;
    return match ? toStoredMatch(match) : null;
  };
  const storeRound = (ids: readonly string[]) =>
    ids.flatMap((id) => {
      const match = bracket.matches.get(id);
      return match ? [toStoredMatch(match)] : [];
    });

  return {
    revision: bracket.revision,
    reset: bracket.reset,
    winners: bracket.winnerRounds.map(storeRound),
    losers: bracket.loserRounds.map(storeRound),
    grandFinal: storeOne(bracket.grandFinal),
    grandFinalReset: storeOne(bracket.grandFinalReset),
  };
}

export function serializePlayoff(playoff: Playoff): StoredPlayoff {
  if (playoff.kind === 'double-elimination') {
    return { kind: playoff.kind, ...serializeBracket(playoff.bracket) };
  }
  const { revision, currentRound, rounds } = playoff.bracket;
  return {
    kind: playoff.kind,
    revision,
    currentRound,
    rounds: rounds.map((round) => round.map(toStoredMatch)),
  };
}

function checkWinner(raw: ParsedMatch, tournamentId: string): void {
  if (raw.winner !== null && raw.winner !== raw.participant1 && raw.winner !== raw.participant2) {
    throw BracketErrors.corrupt(tournamentId, `winner of ${raw.id} did not play in it`);
  }
}

function checkId(raw: ParsedMatch, expectedId: string, tournamentId: string): void {
  if (raw.id !== expectedId) {
    throw BracketErrors.corrupt(tournamentId, `expected match ${expectedId}, found ${raw.id}`);
  }
}

function buildBracket(stored: z.infer<typeof storedBracketSchema>, tournamentId: string): Bracket {
  const matches = new Map<string, BracketMatch>();

  const load = (raw: ParsedMatch, ladder: BracketMatch['ladder'], round: number, expectedId: string) => {
    checkId(raw, expectedId, tournamentId);
    checkWinner(raw, tournamentId);
    matches.set(raw.id, { ...raw, ladder, round });
    return raw.id;
  };

  const winnerRounds = stored.winners.map((round, r) =>
    round.map((raw, n) => load(raw, 'winners', r + 1, bracketMatchId('winners', r + 1, n + 1)))
  );
  const loserRounds = stored.losers.map((round, r) =>
    round.map((raw, n) => load(raw, 'losers', r + 1, bracketMatchId('losers', r + 1, n + 1)))
  );
  const grandFinal = stored.grandFinal
    ? load(stored.grandFinal, 'grand_final', 1, GRAND_FINAL_ID)
    : null;
  const grandFinalReset = stored.grandFinalReset
    ? load(stored.grandFinalReset, 'grand_final', 2, GRAND_FINAL_RESET_ID)
    : null;

  return {
    matches,
    winnerRounds,
    loserRounds,
    grandFinal,
    grandFinalReset,
    reset: stored.reset,
    revision: stored.revision,
  };
}

function buildSingleElimination(
  stored: z.infer<typeof storedSingleEliminationSchema>,
  tournamentId: string
): SingleEliminationBracket {
  if (stored.currentRound > stored.rounds.length + 1) {
    throw BracketErrors.corrupt(tournamentId, `current round ${stored.currentRound} was never opened`);
  }

  const rounds = stored.rounds.map((round, r) =>
    round.map((raw, n): SingleEliminationMatch => {
      checkId(raw, `r${r + 1}_${n + 1}`, tournamentId);
      checkWinner(raw, tournamentId);
      if (raw.participant1 === null || raw.participant2 === null) {
        throw BracketErrors.corrupt(tournamentId, `match ${raw.id} is missing a participant`);
      }
      return {
        id: raw.id,
        round: r + 1,
        participant1: raw.participant1,
        participant2: raw.participant2,
        winner: raw.winner,
      };
    })
  );

  return { rounds, currentRound: stored.currentRound, revision: stored.revision };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid structure';
}

/**
 * @throws DatabaseException when the stored structure is malformed
 */
export function deserializeBracket(data: unknown, tournamentId: string): Bracket {
  const parsed = storedBracketSchema.safeParse(data);
  if (!parsed.success) {
    throw BracketErrors.corrupt(tournamentId, describeIssue(parsed.error));
  }
  return buildBracket(parsed.data, tournamentId);
}

/**
 * @throws DatabaseException when the stored structure is malformed
 */
export function deserializePlayoff(data: unknown, tournamentId: string): Playoff {
  const parsed = storedPlayoffSchema.safeParse(data);
  if (!parsed.success) {
    throw BracketErrors.corrupt(tournamentId, describeIssue(parsed.error));
  }

  const stored = parsed.data;
  return stored.kind === 'double-elimination'
    ? { kind: stored.kind, bracket: buildBracket(stored, tournamentId) }
    : { kind: stored.kind, bracket: buildSingleElimination(stored, tournamentId) };
}
