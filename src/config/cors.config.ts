import cors from 'cors';
import { env } from './env.config';

/**
 * Normalize an origin by stripping trailing slashes.
 */
function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Restrict to FRONTEND_URL when it is set; otherwise reflect any origin.
 */
export function getCorsOptions(): cors.CorsOptions {
  const allowed = env.FRONTEND_URL ? normalizeOrigin(env.FRONTEND_URL) : null;

  return {
    origin: allowed ?? true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  };
}
