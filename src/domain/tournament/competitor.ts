/**
 * Competitor Identifier
 *
 * Canonical, branded identifier for a creature taking part in a tournament.
 * No async I/O, no database access.
 */
import { z } from 'zod';
import { TournamentErrors } from '../../utils/exceptions';

export const MAX_COMPETITOR_ID_LENGTH = 50;

export const competitorIdSchema = z
  .string()
  .trim()
  .min(1, 'identifier cannot be empty')
  .max(MAX_COMPETITOR_ID_LENGTH, `identifier cannot exceed ${MAX_COMPETITOR_ID_LENGTH} characters`)
  .regex(/^[a-zA-Z0-9\-_]+$/, 'identifier may only contain letters, digits, hyphens and underscores')
  .transform((value) => value.toLowerCase())
  .brand<'CompetitorId'>();

export type CompetitorId = z.infer<typeof competitorIdSchema>;

/**
 * Normalize a raw identifier (trim + lower-case) and brand it.
 * @throws ValidationException when the value is not a valid identifier
 */
export function toCompetitorId(raw: string): CompetitorId {
  const parsed = competitorIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw TournamentErrors.invalidCompetitorId(parsed.error.issues[0]?.message ?? 'invalid value');
  }
  return parsed.data;
}

export function toCompetitorIds(raw: readonly string[]): CompetitorId[] {
  return raw.map(toCompetitorId);
}

/**
 * Byte-wise ascending order, used for every deterministic tie-break.
 */
export function compareCompetitorIds(a: CompetitorId, b: CompetitorId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order-independent key for a pair of competitors.
 */
export function pairKey(a: CompetitorId, b: CompetitorId): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}
