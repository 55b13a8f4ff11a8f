import { AuthRequest } from '../middleware/auth.middleware';
import { ValidationException } from './exceptions';
import { getParam } from './params';

/**
 * Extract the authenticated user's email.
 * @throws ValidationException if the request carries no user
 */
export function requireUserEmail(req: AuthRequest): string {
  const email = req.user?.email;
  if (!email) throw new ValidationException('User email not found');
  return email;
}

/**
 * @throws ValidationException if the tournament ID param is missing
 */
export function requireTournamentId(req: AuthRequest): string {
  const tournamentId = getParam(req.params.tournamentId);
  if (!tournamentId) throw new ValidationException('Invalid tournament ID');
  return tournamentId;
}
