import { z } from 'zod';
import {
  DEFAULT_PLAYOFF,
  MATCH_OUTCOMES,
  PLAYOFF_KINDS,
  PlayoffSettings,
  competitorIdSchema,
  playoffSettingsProblem,
} from '../../domain/tournament';

export const MAX_PARTICIPANTS = 1024;

export const tournamentParamsSchema = z.object({
  tournamentId: z.string().uuid('Invalid tournament ID'),
});

export const bracketMatchParamsSchema = tournamentParamsSchema.extend({
  matchId: z.string().min(1, 'Match ID is required').max(16),
});

/**
 * Playoff settings; cutoff defaults to 16 and reset to off.
 */
export const playoffSchema = z
  .object({
    kind: z.enum(PLAYOFF_KINDS, {
      errorMap: () => ({ message: `playoff kind must be one of: ${PLAYOFF_KINDS.join(', ')}` }),
    }),
    cutoff: z.number().int().min(2).max(MAX_PARTICIPANTS).optional(),
    reset: z.boolean().default(false),
  })
  .transform(
    (input): PlayoffSettings => ({
      kind: input.kind,
      cutoff: input.cutoff ?? DEFAULT_PLAYOFF.cutoff,
      reset: input.reset,
    })
  )
  .superRefine((settings, ctx) => {
    const problem = playoffSettingsProblem(settings);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

export const createTournamentSchema = z.object({
  participants: z
    .array(competitorIdSchema)
    .min(1, 'At least one participant is required')
    .max(MAX_PARTICIPANTS, `A tournament cannot exceed ${MAX_PARTICIPANTS} participants`),
  playoff: playoffSchema.default(DEFAULT_PLAYOFF),
});

export const recordMatchSchema = z.object({
  participant1: z.string().min(1, 'participant1 is required'),
  participant2: z.string().min(1, 'participant2 is required'),
  outcome: z.enum(MATCH_OUTCOMES, {
    errorMap: () => ({ message: `outcome must be one of: ${MATCH_OUTCOMES.join(', ')}` }),
  }),
  winner: z.string().min(1).nullable().default(null),
});

export const recordByeSchema = z.object({
  participant: z.string().min(1, 'participant is required'),
});

export const recordBracketResultSchema = z.object({
  winner: z.string().min(1, 'winner is required'),
});

export type CreateTournamentInput = z.infer<typeof createTournamentSchema>;
export type RecordMatchInput = z.infer<typeof recordMatchSchema>;
export type RecordByeInput = z.infer<typeof recordByeSchema>;
export type PlayoffInput = z.infer<typeof playoffSchema>;
export type RecordBracketResultInput = z.infer<typeof recordBracketResultSchema>;
